import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { EntityType } from './entity-type';

/**
 * Planned maintenance slots, written by the maintenance plan importer.
 * (entityId, entityType, fromDatetime, toDatetime) identifies a window.
 */
@Entity('maintenance_windows')
@Index('idx_maintenance_windows_natural', ['entityId', 'entityType', 'fromDatetime', 'toDatetime'], {
  unique: true,
})
export class MaintenanceWindow {
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

  @Column({ type: 'timestamptz' })
  fromDatetime!: Date;

  @Column({ type: 'timestamptz' })
  toDatetime!: Date;

  @Column({ type: 'varchar', length: 64, nullable: true })
  serviceType!: string | null;

  @Column({ type: 'text', nullable: true })
  taskDescription!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
