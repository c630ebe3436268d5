import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { EntityType } from './entity-type';

/**
 * Completed maintenance actions.
 *
 * Cranes and spreaders share this table through the (entityId, entityType)
 * compound identity. Full history is retained; the newest serviceDate per
 * (entityId, entityType, taskId) is the "last service".
 */
@Entity('service_log')
@Index('idx_service_log_entity_task_date', ['entityId', 'entityType', 'taskId', 'serviceDate'])
export class ServiceLogRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 64 })
  entityId!: string;

  @Column({
    type: 'enum',
    enum: EntityType,
    enumName: 'entity_type_enum',
  })
  entityType!: EntityType;

  @Column({ type: 'varchar', length: 128 })
  taskId!: string;

  @Column({ type: 'timestamptz' })
  serviceDate!: Date;

  /**
   * Cumulative usage counter at the time of service (null for calendar tasks)
   */
  @Column({ type: 'double precision', nullable: true })
  servicedAtValue!: number | null;

  @Column({ type: 'varchar', length: 128, nullable: true })
  servicedBy!: string | null;

  @Column({ type: 'double precision', nullable: true })
  durationHours!: number | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
