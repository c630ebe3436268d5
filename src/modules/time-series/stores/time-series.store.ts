/**
 * A stored reading as recorded, with its numeric interpretation if any
 */
export interface MetricReading {
  timestamp: Date;
  value: string;
  numericValue: number | null;
}

export interface NumericReading {
  timestamp: Date;
  value: number;
}

/**
 * Time-series store for MetricSample rows.
 *
 * Abstract class so it can serve as the Nest injection token; the production
 * binding is TypeOrmTimeSeriesStore. The numeric lookups skip samples whose
 * payload is not a number.
 */
export abstract class TimeSeriesStore {
  /**
   * Idempotent per (entityId, metricName, timestamp).
   * Resolves true if a row was written, false if the key already existed.
   */
  abstract insertSample(
    entityId: string,
    metricName: string,
    timestamp: Date,
    value: string,
  ): Promise<boolean>;

  /**
   * Readings with start <= timestamp <= end, oldest first
   */
  abstract getValueRange(
    entityId: string,
    metricName: string,
    start: Date,
    end: Date,
  ): Promise<MetricReading[]>;

  abstract getLatestValue(entityId: string, metricName: string): Promise<MetricReading | null>;

  abstract getLatestNumeric(entityId: string, metricName: string): Promise<NumericReading | null>;

  abstract getNumericAtOrBefore(
    entityId: string,
    metricName: string,
    at: Date,
  ): Promise<NumericReading | null>;

  abstract getEarliestNumeric(entityId: string, metricName: string): Promise<NumericReading | null>;

  abstract countSamples(entityId?: string): Promise<number>;

  /**
   * Drops every sample (full rebuild)
   */
  abstract clear(): Promise<void>;
}

const NUMERIC_PAYLOAD = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Numeric interpretation of a raw log payload, or null if it is not a plain number
 */
export function parseNumericValue(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMERIC_PAYLOAD.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}
