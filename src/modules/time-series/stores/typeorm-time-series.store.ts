import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Repository,
  DataSource,
  Between,
  IsNull,
  LessThanOrEqual,
  Not,
} from 'typeorm';
import { MetricSample } from '../../../entities';
import {
  MetricReading,
  NumericReading,
  TimeSeriesStore,
  parseNumericValue,
} from './time-series.store';

@Injectable()
export class TypeOrmTimeSeriesStore extends TimeSeriesStore {
  constructor(
    @InjectRepository(MetricSample)
    private readonly sampleRepo: Repository<MetricSample>,

    private readonly dataSource: DataSource,
  ) {
    super();
  }

  /**
   * Append a sample, ignoring it if the natural key is already present.
   * RETURNING yields a row only when the insert actually happened.
   */
  async insertSample(
    entityId: string,
    metricName: string,
    timestamp: Date,
    value: string,
  ): Promise<boolean> {
    const rows = await this.dataSource.query<Array<{ entityId: string }>>(
      `
      INSERT INTO metric_samples ("entityId", "metricName", "timestamp", "value", "numericValue")
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT ("entityId", "metricName", "timestamp") DO NOTHING
      RETURNING "entityId"
      `,
      [entityId, metricName, timestamp, value, parseNumericValue(value)],
    );

    return rows.length > 0;
  }

  /**
   * Uses: PK_metric_samples (entityId, metricName, timestamp)
   */
  async getValueRange(
    entityId: string,
    metricName: string,
    start: Date,
    end: Date,
  ): Promise<MetricReading[]> {
    const samples = await this.sampleRepo.find({
      where: { entityId, metricName, timestamp: Between(start, end) },
      order: { timestamp: 'ASC' },
    });

    return samples.map(toReading);
  }

  async getLatestValue(entityId: string, metricName: string): Promise<MetricReading | null> {
    const sample = await this.sampleRepo.findOne({
      where: { entityId, metricName },
      order: { timestamp: 'DESC' },
    });

    return sample ? toReading(sample) : null;
  }

  async getLatestNumeric(entityId: string, metricName: string): Promise<NumericReading | null> {
    const sample = await this.sampleRepo.findOne({
      where: { entityId, metricName, numericValue: Not(IsNull()) },
      order: { timestamp: 'DESC' },
    });

    return toNumericReading(sample);
  }

  async getNumericAtOrBefore(
    entityId: string,
    metricName: string,
    at: Date,
  ): Promise<NumericReading | null> {
    const sample = await this.sampleRepo.findOne({
      where: {
        entityId,
        metricName,
        timestamp: LessThanOrEqual(at),
        numericValue: Not(IsNull()),
      },
      order: { timestamp: 'DESC' },
    });

    return toNumericReading(sample);
  }

  async getEarliestNumeric(entityId: string, metricName: string): Promise<NumericReading | null> {
    const sample = await this.sampleRepo.findOne({
      where: { entityId, metricName, numericValue: Not(IsNull()) },
      order: { timestamp: 'ASC' },
    });

    return toNumericReading(sample);
  }

  async countSamples(entityId?: string): Promise<number> {
    return this.sampleRepo.count({ where: entityId ? { entityId } : {} });
  }

  async clear(): Promise<void> {
    await this.sampleRepo.clear();
  }
}

function toReading(sample: MetricSample): MetricReading {
  return {
    timestamp: sample.timestamp,
    value: sample.value,
    numericValue: sample.numericValue,
  };
}

function toNumericReading(sample: MetricSample | null): NumericReading | null {
  if (!sample || sample.numericValue === null) {
    return null;
  }
  return { timestamp: sample.timestamp, value: sample.numericValue };
}
