import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Between, DataSource, IsNull, LessThanOrEqual, Not } from 'typeorm';
import { MetricSample } from '../../../entities';
import { parseNumericValue } from './time-series.store';
import { TypeOrmTimeSeriesStore } from './typeorm-time-series.store';

function sample(timestamp: string, value: string, numericValue: number | null): MetricSample {
  const row = new MetricSample();
  row.entityId = 'RMG04';
  row.metricName = 'hoist_cycles';
  row.timestamp = new Date(timestamp);
  row.value = value;
  row.numericValue = numericValue;
  row.ingestedAt = new Date('2025-07-01T00:00:00Z');
  return row;
}

describe('TypeOrmTimeSeriesStore', () => {
  const repo = {
    find: jest.fn(),
    findOne: jest.fn(),
    count: jest.fn(),
    clear: jest.fn(),
  };
  const dataSource = { query: jest.fn() };
  let store: TypeOrmTimeSeriesStore;

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        TypeOrmTimeSeriesStore,
        { provide: getRepositoryToken(MetricSample), useValue: repo },
        { provide: DataSource, useValue: dataSource },
      ],
    }).compile();
    store = moduleRef.get(TypeOrmTimeSeriesStore);
  });

  it('reports an inserted row', async () => {
    dataSource.query.mockResolvedValue([{ entityId: 'RMG04' }]);
    const at = new Date('2025-06-14T08:00:00Z');

    await expect(store.insertSample('RMG04', 'hoist_cycles', at, ' 1200 ')).resolves.toBe(true);
    expect(dataSource.query).toHaveBeenCalledWith(expect.stringContaining('ON CONFLICT'), [
      'RMG04',
      'hoist_cycles',
      at,
      ' 1200 ',
      1200,
    ]);
  });

  it('reports a duplicate key as not inserted', async () => {
    dataSource.query.mockResolvedValue([]);

    await expect(
      store.insertSample('RMG04', 'mode', new Date('2025-06-14T08:00:00Z'), 'Auto'),
    ).resolves.toBe(false);
    expect(dataSource.query.mock.calls[0][1][4]).toBeNull();
  });

  it('queries a closed range oldest first', async () => {
    repo.find.mockResolvedValue([sample('2025-06-14T08:00:00Z', '1000', 1000)]);
    const start = new Date('2025-06-01T00:00:00Z');
    const end = new Date('2025-06-30T00:00:00Z');

    const readings = await store.getValueRange('RMG04', 'hoist_cycles', start, end);

    expect(repo.find).toHaveBeenCalledWith({
      where: { entityId: 'RMG04', metricName: 'hoist_cycles', timestamp: Between(start, end) },
      order: { timestamp: 'ASC' },
    });
    expect(readings).toEqual([
      { timestamp: new Date('2025-06-14T08:00:00Z'), value: '1000', numericValue: 1000 },
    ]);
  });

  it('looks up the numeric value at or before an instant', async () => {
    repo.findOne.mockResolvedValue(sample('2025-06-01T09:00:00Z', '900', 900));
    const at = new Date('2025-06-01T10:00:00Z');

    const reading = await store.getNumericAtOrBefore('RMG04', 'hoist_cycles', at);

    expect(repo.findOne).toHaveBeenCalledWith({
      where: {
        entityId: 'RMG04',
        metricName: 'hoist_cycles',
        timestamp: LessThanOrEqual(at),
        numericValue: Not(IsNull()),
      },
      order: { timestamp: 'DESC' },
    });
    expect(reading).toEqual({ timestamp: new Date('2025-06-01T09:00:00Z'), value: 900 });
  });

  it('returns null when nothing numeric exists', async () => {
    repo.findOne.mockResolvedValue(null);

    await expect(store.getEarliestNumeric('RMG04', 'hoist_cycles')).resolves.toBeNull();
  });

  it('counts all samples or one entity', async () => {
    repo.count.mockResolvedValue(7);

    await store.countSamples();
    await store.countSamples('RMG04');

    expect(repo.count).toHaveBeenNthCalledWith(1, { where: {} });
    expect(repo.count).toHaveBeenNthCalledWith(2, { where: { entityId: 'RMG04' } });
  });
});

describe('parseNumericValue', () => {
  it.each([
    ['184233', 184233],
    [' -12.5 ', -12.5],
    ['.5', 0.5],
    ['1e3', 1000],
  ])('reads %p as a number', (raw, expected) => {
    expect(parseNumericValue(raw)).toBe(expected);
  });

  it.each(['', 'Auto', '12 cycles', '1,234', 'NaN', 'Infinity'])('rejects %p', (raw) => {
    expect(parseNumericValue(raw)).toBeNull();
  });
});
