import { Entity, Column, PrimaryColumn, Index, CreateDateColumn } from 'typeorm';

/**
 * Time-series store for normalized equipment statistics
 *
 * Design Decisions:
 * - Composite primary key (entityId, metricName, timestamp) is the natural key,
 *   so re-ingesting a log file is a no-op (INSERT ... ON CONFLICT DO NOTHING)
 * - Raw payload is kept verbatim; numericValue is filled when the payload parses
 *   as a number and is what the prediction engine reads
 * - Rows are never updated, only removed by a full rebuild
 */
@Entity('metric_samples')
@Index('idx_metric_samples_timestamp', ['timestamp'])
export class MetricSample {
  /**
   * Equipment identifier as it appears in the tag descriptor (e.g. RMG04)
   */
  @PrimaryColumn({ type: 'varchar', length: 64 })
  entityId!: string;

  /**
   * Canonical statistic name after tag resolution
   */
  @PrimaryColumn({ type: 'varchar', length: 255 })
  metricName!: string;

  /**
   * Reading time from the log line (UTC)
   */
  @PrimaryColumn({ type: 'timestamptz' })
  timestamp!: Date;

  /**
   * Result payload as recorded in the log
   */
  @Column({ type: 'text' })
  value!: string;

  @Column({ type: 'double precision', nullable: true })
  numericValue!: number | null;

  @CreateDateColumn({ type: 'timestamptz' })
  ingestedAt!: Date;
}
