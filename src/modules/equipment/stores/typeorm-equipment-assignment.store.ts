import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EquipmentAssignment } from '../../../entities';
import { AssignmentPair, EquipmentAssignmentStore } from './equipment-assignment.store';

@Injectable()
export class TypeOrmEquipmentAssignmentStore extends EquipmentAssignmentStore {
  private readonly logger = new Logger(TypeOrmEquipmentAssignmentStore.name);

  constructor(
    @InjectRepository(EquipmentAssignment)
    private readonly assignmentRepo: Repository<EquipmentAssignment>,
  ) {
    super();
  }

  /**
   * Create assignment (spreader -> crane); existing pairs are left untouched
   */
  async assign(compositeEntityId: string, memberEntityId: string): Promise<void> {
    await this.assignmentRepo
      .createQueryBuilder()
      .insert()
      .into(EquipmentAssignment)
      .values({ compositeEntityId, memberEntityId })
      .orIgnore()
      .execute();

    this.logger.log(`Equipment assignment recorded: ${compositeEntityId} -> ${memberEntityId}`);
  }

  async unassign(compositeEntityId: string, memberEntityId: string): Promise<boolean> {
    const result = await this.assignmentRepo.delete({ compositeEntityId, memberEntityId });
    const removed = (result.affected ?? 0) > 0;

    if (removed) {
      this.logger.log(`Equipment assignment removed: ${compositeEntityId} -> ${memberEntityId}`);
    }

    return removed;
  }

  async getMembers(compositeEntityId: string): Promise<string[]> {
    const rows = await this.assignmentRepo.find({
      where: { compositeEntityId },
      order: { memberEntityId: 'ASC' },
    });

    return rows.map((row) => row.memberEntityId);
  }

  async listAssignments(): Promise<AssignmentPair[]> {
    const rows = await this.assignmentRepo.find({
      order: { compositeEntityId: 'ASC', memberEntityId: 'ASC' },
    });

    return rows.map(({ compositeEntityId, memberEntityId }) => ({
      compositeEntityId,
      memberEntityId,
    }));
  }
}
