import { readFile } from 'fs/promises';
import { LoggerService } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { describeError } from '../../common/errors';

const NON_PRINTABLE = /[^\x20-\x7E]/g;

/**
 * Strip everything outside printable ASCII, then trim
 */
export function cleanTag(raw: string): string {
  return raw.replace(NON_PRINTABLE, '').trim();
}

function isCellRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === 'string');
}

/**
 * Maps cleaned raw tag codes to canonical metric names.
 * Total: an unmapped code resolves to itself (cleaned).
 */
export class TagResolver {
  constructor(
    private readonly mapping: ReadonlyMap<string, string>,
    readonly skippedRows = 0,
  ) {}

  /**
   * Build from a TAG,FV table. The header must name both columns; rows
   * that are short or have an empty key or value are skipped and counted.
   */
  static fromCsv(text: string): TagResolver {
    const parsed: unknown = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
    const rows = Array.isArray(parsed) ? parsed.filter(isCellRow) : [];

    const mapping = new Map<string, string>();
    const [header, ...records] = rows;
    if (!header) {
      return new TagResolver(mapping);
    }

    const columns = header.map((cell) => cell.trim());
    const tagColumn = columns.indexOf('TAG');
    const fvColumn = columns.indexOf('FV');
    if (tagColumn < 0 || fvColumn < 0) {
      throw new Error('tag mapping table needs TAG and FV columns');
    }

    let skipped = 0;
    for (const record of records) {
      const key = cleanTag(record[tagColumn] ?? '');
      const value = cleanTag(record[fvColumn] ?? '');
      if (key === '' || value === '') {
        skipped++;
        continue;
      }
      mapping.set(key, value);
    }

    return new TagResolver(mapping, skipped);
  }

  /**
   * Load the mapping for one ingestion run. Any problem with the table is
   * logged and ingestion proceeds with raw tag names.
   */
  static async load(path: string, logger: LoggerService): Promise<TagResolver> {
    try {
      const resolver = TagResolver.fromCsv(await readFile(path, 'utf8'));
      logger.log(`Loaded ${resolver.size} tag mappings from '${path}'`);
      if (resolver.skippedRows > 0) {
        logger.warn(`Skipped ${resolver.skippedRows} incomplete rows in '${path}'`);
      }
      return resolver;
    } catch (error) {
      logger.error(
        `Tag mapping '${path}' unavailable, raw tag names will be used: ${describeError(error)}`,
      );
      return new TagResolver(new Map());
    }
  }

  get size(): number {
    return this.mapping.size;
  }

  resolve(rawTag: string): string {
    const cleaned = cleanTag(rawTag);
    return this.mapping.get(cleaned) ?? cleaned;
  }
}
