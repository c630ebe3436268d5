import { EntityType, ServiceLogRecord } from '../../../entities';

export interface NewServiceRecord {
  entityId: string;
  entityType: EntityType;
  taskId: string;
  serviceDate: Date;
  servicedAtValue?: number | null;
  servicedBy?: string | null;
  durationHours?: number | null;
}

/**
 * Service history store. Records are keyed by the compound
 * (entityId, entityType) identity plus taskId; all history is kept.
 */
export abstract class ServiceLogStore {
  abstract logServiceCompleted(input: NewServiceRecord): Promise<ServiceLogRecord>;

  /**
   * Record with the newest serviceDate (ties go to the newest id)
   */
  abstract getLastServiceRecord(
    entityId: string,
    entityType: EntityType,
    taskId: string,
  ): Promise<ServiceLogRecord | null>;

  /**
   * Newest first
   */
  abstract listServiceHistory(
    entityId: string,
    entityType: EntityType,
    taskId?: string,
  ): Promise<ServiceLogRecord[]>;

  /**
   * Administrative correction. Resolves false when nothing was deleted
   * or the delete failed.
   */
  abstract deleteServiceLog(id: number): Promise<boolean>;
}
