import { QueryRunner } from 'typeorm';
import { InitialSchema1760000000000 } from './1760000000000-InitialSchema';

describe('InitialSchema1760000000000', () => {
  function recordQueries(): { runner: Pick<QueryRunner, 'query'>; statements: string[] } {
    const statements: string[] = [];
    const query = jest.fn(async (sql: string) => {
      statements.push(sql.replace(/\s+/g, ' ').trim());
      return [];
    });
    const runner: Pick<QueryRunner, 'query'> = { query };
    return { runner, statements };
  }

  it('keys metric_samples on entity, metric and timestamp without a second index over the same columns', async () => {
    const { runner, statements } = recordQueries();

    await new InitialSchema1760000000000().up(runner);

    const table = statements.find((sql) => sql.startsWith('CREATE TABLE IF NOT EXISTS "metric_samples"'));
    expect(table).toContain('CONSTRAINT "PK_metric_samples" PRIMARY KEY ("entityId", "metricName", "timestamp")');

    const sampleIndexes = statements.filter(
      (sql) => sql.startsWith('CREATE INDEX') && sql.includes('ON "metric_samples"'),
    );
    expect(sampleIndexes).toEqual([
      'CREATE INDEX IF NOT EXISTS "idx_metric_samples_timestamp" ON "metric_samples" ("timestamp")',
    ]);
  });
});
