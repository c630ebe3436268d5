import { Entity, PrimaryColumn, CreateDateColumn, Index } from 'typeorm';

/**
 * Equipment Assignment Table
 *
 * Maps a composite entity (spreader) to every crane it has accrued usage on.
 * Usage for the spreader is the sum of its member cranes' counters.
 */
@Entity('equipment_assignment')
@Index('idx_equipment_assignment_member', ['memberEntityId'])
export class EquipmentAssignment {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  compositeEntityId!: string;

  @PrimaryColumn({ type: 'varchar', length: 64 })
  memberEntityId!: string;

  /**
   * When the assignment was recorded
   */
  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
