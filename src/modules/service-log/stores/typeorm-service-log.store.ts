import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EntityType, ServiceLogRecord } from '../../../entities';
import { describeError } from '../../../common/errors';
import { NewServiceRecord, ServiceLogStore } from './service-log.store';

@Injectable()
export class TypeOrmServiceLogStore extends ServiceLogStore {
  private readonly logger = new Logger(TypeOrmServiceLogStore.name);

  constructor(
    @InjectRepository(ServiceLogRecord)
    private readonly serviceLogRepo: Repository<ServiceLogRecord>,
  ) {
    super();
  }

  async logServiceCompleted(input: NewServiceRecord): Promise<ServiceLogRecord> {
    const record = this.serviceLogRepo.create({
      entityId: input.entityId,
      entityType: input.entityType,
      taskId: input.taskId,
      serviceDate: input.serviceDate,
      servicedAtValue: input.servicedAtValue ?? null,
      servicedBy: input.servicedBy ?? null,
      durationHours: input.durationHours ?? null,
    });

    const saved = await this.serviceLogRepo.save(record);

    this.logger.log(
      `Service logged: ${input.entityType} ${input.entityId} / ${input.taskId} @ ${input.serviceDate.toISOString()}`,
    );

    return saved;
  }

  /**
   * Uses: idx_service_log_entity_task_date
   */
  async getLastServiceRecord(
    entityId: string,
    entityType: EntityType,
    taskId: string,
  ): Promise<ServiceLogRecord | null> {
    return this.serviceLogRepo.findOne({
      where: { entityId, entityType, taskId },
      order: { serviceDate: 'DESC', id: 'DESC' },
    });
  }

  async listServiceHistory(
    entityId: string,
    entityType: EntityType,
    taskId?: string,
  ): Promise<ServiceLogRecord[]> {
    return this.serviceLogRepo.find({
      where: taskId ? { entityId, entityType, taskId } : { entityId, entityType },
      order: { serviceDate: 'DESC', id: 'DESC' },
    });
  }

  async deleteServiceLog(id: number): Promise<boolean> {
    try {
      const result = await this.serviceLogRepo.delete({ id });
      const deleted = (result.affected ?? 0) > 0;

      if (deleted) {
        this.logger.log(`Service log entry ${id} deleted`);
      } else {
        this.logger.warn(`Service log entry ${id} not found; nothing deleted`);
      }

      return deleted;
    } catch (error) {
      this.logger.error(`Failed to delete service log entry ${id}: ${describeError(error)}`);
      return false;
    }
  }
}
