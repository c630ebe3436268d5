/**
 * Shape of the tag descriptor in a log line:
 *   TAG:[<EQ>/<EQ>:<staticPrefix>.<statisticType>.<detail>]
 */
export interface LogGrammarSettings {
  equipmentPrefix: string;
  staticPrefix: string;
  statisticType: string;
}

export interface SearchPatternSettings extends LogGrammarSettings {
  rangeStart: number;
  rangeEnd: number;
}

/**
 * Equipment ids for an inclusive numeric range, two-digit padded (RMG01..RMG12)
 */
export function buildEquipmentIds(prefix: string, start: number, end: number): string[] {
  const ids: string[] = [];
  for (let n = start; n <= end; n++) {
    ids.push(`${prefix}${String(n).padStart(2, '0')}`);
  }
  return ids;
}

export function tagDescriptorPrefix(equipmentId: string, settings: LogGrammarSettings): string {
  return `TAG:[${equipmentId}/${equipmentId}:${settings.staticPrefix}.${settings.statisticType}.`;
}

/**
 * Cross product of equipment ids and tag ids, each a complete tag descriptor
 */
export function buildSearchPatterns(settings: SearchPatternSettings, tagIds: string[]): string[] {
  const equipmentIds = buildEquipmentIds(
    settings.equipmentPrefix,
    settings.rangeStart,
    settings.rangeEnd,
  );

  return equipmentIds.flatMap((equipmentId) =>
    tagIds.map((tagId) => `${tagDescriptorPrefix(equipmentId, settings)}${tagId}]`),
  );
}

/**
 * One tag id per line; blank lines ignored
 */
export function parseTagIds(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Cheap substring pre-filter run on every line before the structured grammar
 */
export class CandidateFilter {
  private readonly patterns: readonly string[];

  constructor(patterns: string[]) {
    this.patterns = [...new Set(patterns)];
  }

  get size(): number {
    return this.patterns.length;
  }

  matches(line: string): boolean {
    if (!line.includes('TAG:[')) {
      return false;
    }
    return this.patterns.some((pattern) => line.includes(pattern));
  }
}
