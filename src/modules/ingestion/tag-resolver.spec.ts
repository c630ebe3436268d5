import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { cleanTag, TagResolver } from './tag-resolver';
import { RecordingLogger } from '../../../test/support/recording-logger';

describe('cleanTag', () => {
  it('removes control and non-ASCII characters and trims', () => {
    expect(cleanTag('  Hoist\u0000Cyclesé ')).toBe('HoistCycles');
  });
});

describe('TagResolver', () => {
  const resolver = TagResolver.fromCsv(
    ['TAG,FV', 'HoistCycles,hoist_cycles', ' Gantry\u0001Km ,gantry_km', 'Orphan,'].join('\n'),
  );

  it('maps known codes', () => {
    expect(resolver.resolve('HoistCycles')).toBe('hoist_cycles');
  });

  it('cleans table keys and looked-up codes the same way', () => {
    expect(resolver.resolve('GantryKm\u0002')).toBe('gantry_km');
  });

  it('falls back to the cleaned raw code', () => {
    expect(resolver.resolve('Unknown\u0003')).toBe('Unknown');
  });

  it('ignores rows without a canonical name', () => {
    expect(resolver.size).toBe(2);
    expect(resolver.skippedRows).toBe(1);
    expect(resolver.resolve('Orphan')).toBe('Orphan');
  });

  it('skips short rows and keeps the rest of the table', () => {
    const table = TagResolver.fromCsv('TAG,FV\nHoistCycles,hoist_cycles\nOrphan\nSpreaderLandings,spreader_landings\n');

    expect(table.resolve('HoistCycles')).toBe('hoist_cycles');
    expect(table.resolve('SpreaderLandings')).toBe('spreader_landings');
    expect(table.size).toBe(2);
    expect(table.skippedRows).toBe(1);
  });

  it('finds the columns by header name', () => {
    const table = TagResolver.fromCsv('FV,NOTE,TAG\nhoist_cycles,x,HoistCycles\n');

    expect(table.resolve('HoistCycles')).toBe('hoist_cycles');
  });

  it('requires TAG and FV columns', () => {
    expect(() => TagResolver.fromCsv('CODE,NAME\nA,b\n')).toThrow(
      'tag mapping table needs TAG and FV columns',
    );
  });

  describe('load', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'tag-resolver-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads the mapping from disk', async () => {
      const path = join(dir, 'TAG_CHANGE.csv');
      await writeFile(path, 'TAG,FV\nHoistCycles,hoist_cycles\n');
      const logger = new RecordingLogger();

      const loaded = await TagResolver.load(path, logger);

      expect(loaded.resolve('HoistCycles')).toBe('hoist_cycles');
      expect(logger.errors).toEqual([]);
    });

    it('warns about skipped rows', async () => {
      const path = join(dir, 'TAG_CHANGE.csv');
      await writeFile(path, 'TAG,FV\nHoistCycles,hoist_cycles\nOrphan\n');
      const logger = new RecordingLogger();

      const loaded = await TagResolver.load(path, logger);

      expect(loaded.resolve('HoistCycles')).toBe('hoist_cycles');
      expect(logger.warnings).toEqual([`Skipped 1 incomplete rows in '${path}'`]);
      expect(logger.errors).toEqual([]);
    });

    it('falls back to an empty mapping when the file is missing', async () => {
      const logger = new RecordingLogger();

      const loaded = await TagResolver.load(join(dir, 'missing.csv'), logger);

      expect(loaded.size).toBe(0);
      expect(loaded.resolve('HoistCycles')).toBe('HoistCycles');
      expect(logger.errors).toHaveLength(1);
    });
  });
});
