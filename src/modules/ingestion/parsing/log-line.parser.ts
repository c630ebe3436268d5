import { parseLogTimestamp } from './log-timestamp';
import { LogGrammarSettings, tagDescriptorPrefix } from './search-patterns';
import { cleanTag } from '../tag-resolver';

export interface ParsedLogLine {
  equipmentId: string;
  tagDetail: string;
  timestamp: Date;
  result: string;
}

export type LineFailureReason = 'grammar' | 'equipment' | 'tag-detail' | 'timestamp';

export type LineParseOutcome =
  | { ok: true; line: ParsedLogLine }
  | { ok: false; reason: LineFailureReason; message: string };

// <timestamp>: (<seq>): TAG:[...] <result...>
const LINE_GRAMMAR = /^(.*?): \(\d+\): (TAG:\[[^\]]+\])\s*(.*)$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Structured extraction for lines that passed the candidate filter.
 * Never throws; every failure comes back as an outcome with a reason.
 */
export class LogLineParser {
  private readonly equipmentPattern: RegExp;

  constructor(private readonly settings: LogGrammarSettings) {
    this.equipmentPattern = new RegExp(
      `TAG:\\[(${escapeRegExp(settings.equipmentPrefix)}\\d{2})/`,
    );
  }

  parse(rawLine: string): LineParseOutcome {
    const line = rawLine.trim();
    const match = LINE_GRAMMAR.exec(line);
    if (!match) {
      return { ok: false, reason: 'grammar', message: 'line does not match the log grammar' };
    }

    const [, timestampText, tagDescriptor, resultText] = match;

    const equipmentMatch = this.equipmentPattern.exec(tagDescriptor);
    if (!equipmentMatch) {
      return {
        ok: false,
        reason: 'equipment',
        message: `could not extract equipment id from ${tagDescriptor}`,
      };
    }
    const equipmentId = equipmentMatch[1];

    const detailPattern = new RegExp(
      `${escapeRegExp(tagDescriptorPrefix(equipmentId, this.settings))}([^\\]]+)\\]`,
    );
    const detailMatch = detailPattern.exec(tagDescriptor);
    const tagDetail = detailMatch ? cleanTag(detailMatch[1]) : '';
    if (tagDetail === '') {
      return {
        ok: false,
        reason: 'tag-detail',
        message: `could not extract tag detail from ${tagDescriptor}`,
      };
    }

    const timestamp = parseLogTimestamp(timestampText);
    if (!timestamp) {
      return {
        ok: false,
        reason: 'timestamp',
        message: `could not parse timestamp '${timestampText}'`,
      };
    }

    return {
      ok: true,
      line: { equipmentId, tagDetail, timestamp, result: resultText.trim() },
    };
  }
}
