import {
  MetricReading,
  NumericReading,
  TimeSeriesStore,
  parseNumericValue,
} from '../../src/modules/time-series/stores/time-series.store';

/**
 * In-process TimeSeriesStore with the same key and ordering rules
 * as the Postgres-backed store
 */
export class InMemoryTimeSeriesStore extends TimeSeriesStore {
  private readonly series = new Map<string, Map<string, Map<number, MetricReading>>>();

  async insertSample(
    entityId: string,
    metricName: string,
    timestamp: Date,
    value: string,
  ): Promise<boolean> {
    const readings = this.readingsFor(entityId, metricName, true);
    if (readings.has(timestamp.getTime())) {
      return false;
    }
    readings.set(timestamp.getTime(), {
      timestamp: new Date(timestamp.getTime()),
      value,
      numericValue: parseNumericValue(value),
    });
    return true;
  }

  async getValueRange(
    entityId: string,
    metricName: string,
    start: Date,
    end: Date,
  ): Promise<MetricReading[]> {
    return this.sorted(entityId, metricName).filter(
      (r) => r.timestamp.getTime() >= start.getTime() && r.timestamp.getTime() <= end.getTime(),
    );
  }

  async getLatestValue(entityId: string, metricName: string): Promise<MetricReading | null> {
    const readings = this.sorted(entityId, metricName);
    return readings.length > 0 ? readings[readings.length - 1] : null;
  }

  async getLatestNumeric(entityId: string, metricName: string): Promise<NumericReading | null> {
    const numeric = this.numeric(entityId, metricName);
    return numeric.length > 0 ? numeric[numeric.length - 1] : null;
  }

  async getNumericAtOrBefore(
    entityId: string,
    metricName: string,
    at: Date,
  ): Promise<NumericReading | null> {
    const numeric = this.numeric(entityId, metricName).filter(
      (r) => r.timestamp.getTime() <= at.getTime(),
    );
    return numeric.length > 0 ? numeric[numeric.length - 1] : null;
  }

  async getEarliestNumeric(entityId: string, metricName: string): Promise<NumericReading | null> {
    return this.numeric(entityId, metricName)[0] ?? null;
  }

  async countSamples(entityId?: string): Promise<number> {
    let count = 0;
    for (const [id, metrics] of this.series) {
      if (entityId !== undefined && id !== entityId) {
        continue;
      }
      for (const readings of metrics.values()) {
        count += readings.size;
      }
    }
    return count;
  }

  async clear(): Promise<void> {
    this.series.clear();
  }

  private readingsFor(
    entityId: string,
    metricName: string,
    create: boolean,
  ): Map<number, MetricReading> {
    let metrics = this.series.get(entityId);
    if (!metrics) {
      metrics = new Map();
      if (create) {
        this.series.set(entityId, metrics);
      }
    }
    let readings = metrics.get(metricName);
    if (!readings) {
      readings = new Map();
      if (create) {
        metrics.set(metricName, readings);
      }
    }
    return readings;
  }

  private sorted(entityId: string, metricName: string): MetricReading[] {
    return [...this.readingsFor(entityId, metricName, false).values()].sort(
      (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
    );
  }

  private numeric(entityId: string, metricName: string): NumericReading[] {
    const result: NumericReading[] = [];
    for (const reading of this.sorted(entityId, metricName)) {
      if (reading.numericValue !== null) {
        result.push({ timestamp: reading.timestamp, value: reading.numericValue });
      }
    }
    return result;
  }
}
