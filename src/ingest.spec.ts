import { parseIngestArgs } from './ingest';

describe('parseIngestArgs', () => {
  it('reads every option', () => {
    expect(parseIngestArgs(['--dir', '/data/logs', '--max-files', '20', '--rebuild'])).toEqual({
      directory: '/data/logs',
      maxFiles: 20,
      rebuild: true,
    });
  });

  it('defaults to nothing', () => {
    expect(parseIngestArgs([])).toEqual({});
  });

  it('rejects a non-positive file cap', () => {
    expect(() => parseIngestArgs(['--max-files', '0'])).toThrow('--max-files needs a positive integer');
  });

  it('rejects unknown arguments', () => {
    expect(() => parseIngestArgs(['--verbose'])).toThrow("unknown argument '--verbose'");
  });
});
