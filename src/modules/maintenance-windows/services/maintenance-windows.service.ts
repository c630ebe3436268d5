import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  QueryFailedError,
  Repository,
} from 'typeorm';
import { EntityType, MaintenanceWindow } from '../../../entities';
import { describeError } from '../../../common/errors';

export interface NewMaintenanceWindow {
  entityId: string;
  entityType: EntityType;
  fromDatetime: Date;
  toDatetime: Date;
  serviceType?: string | null;
  taskDescription?: string | null;
  notes?: string | null;
}

export interface MaintenanceWindowFilter {
  entityId?: string;
  from?: Date;
  to?: Date;
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

@Injectable()
export class MaintenanceWindowsService {
  private readonly logger = new Logger(MaintenanceWindowsService.name);

  constructor(
    @InjectRepository(MaintenanceWindow)
    private readonly windowRepo: Repository<MaintenanceWindow>,
  ) {}

  async addWindow(input: NewMaintenanceWindow): Promise<MaintenanceWindow> {
    if (input.toDatetime.getTime() <= input.fromDatetime.getTime()) {
      throw new BadRequestException('toDatetime must be after fromDatetime');
    }

    const existing = await this.windowRepo.findOne({
      where: {
        entityId: input.entityId,
        entityType: input.entityType,
        fromDatetime: input.fromDatetime,
        toDatetime: input.toDatetime,
      },
    });
    if (existing) {
      throw this.duplicateWindow(input);
    }

    let window: MaintenanceWindow;
    try {
      window = await this.windowRepo.save(
        this.windowRepo.create({
          entityId: input.entityId,
          entityType: input.entityType,
          fromDatetime: input.fromDatetime,
          toDatetime: input.toDatetime,
          serviceType: input.serviceType ?? null,
          taskDescription: input.taskDescription ?? null,
          notes: input.notes ?? null,
        }),
      );
    } catch (error) {
      // A concurrent insert of the same window got past the lookup above
      if (isUniqueViolation(error)) {
        throw this.duplicateWindow(input);
      }
      throw error;
    }

    this.logger.log(`Maintenance window ${window.id} planned for ${input.entityType} ${input.entityId}`);
    return window;
  }

  /**
   * Windows overlapping [from, to], earliest start first
   */
  async listWindows(filter: MaintenanceWindowFilter = {}): Promise<MaintenanceWindow[]> {
    const where: FindOptionsWhere<MaintenanceWindow> = {};
    if (filter.entityId) {
      where.entityId = filter.entityId;
    }
    if (filter.from) {
      where.toDatetime = MoreThanOrEqual(filter.from);
    }
    if (filter.to) {
      where.fromDatetime = LessThanOrEqual(filter.to);
    }

    return this.windowRepo.find({
      where,
      order: { fromDatetime: 'ASC', id: 'ASC' },
    });
  }

  async deleteWindow(id: number): Promise<boolean> {
    try {
      const result = await this.windowRepo.delete({ id });
      return (result.affected ?? 0) > 0;
    } catch (error) {
      this.logger.error(`Failed to delete maintenance window ${id}: ${describeError(error)}`);
      return false;
    }
  }

  private duplicateWindow(input: NewMaintenanceWindow): ConflictException {
    return new ConflictException(
      `Window ${input.fromDatetime.toISOString()} - ${input.toDatetime.toISOString()} already planned for ${input.entityId}`,
    );
  }
}
