// YYYY-MM-DD_HH.MM.SS.ffffff
const LOG_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})_(\d{2})\.(\d{2})\.(\d{2})\.(\d{1,6})$/;

/**
 * Parse a log timestamp as UTC. Sub-millisecond digits are truncated.
 * Returns null for anything malformed or out of range (e.g. 2025-02-30).
 */
export function parseLogTimestamp(text: string): Date | null {
  const match = LOG_TIMESTAMP.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, fraction] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const millis = Number(fraction.padEnd(6, '0').slice(0, 3));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));

  // Date.UTC rolls invalid days into the next month
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}
