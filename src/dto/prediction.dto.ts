import { ApiProperty } from '@nestjs/swagger';
import { EntityType } from '../entities';

export enum PredictionErrorCode {
  UNKNOWN_TASK = 'UNKNOWN_TASK',
  INVALID_TASK_CONFIG = 'INVALID_TASK_CONFIG',
  NO_BASELINE = 'NO_BASELINE',
  NO_TELEMETRY = 'NO_TELEMETRY',
  NO_ASSIGNMENTS = 'NO_ASSIGNMENTS',
  CANNOT_EXTRAPOLATE = 'CANNOT_EXTRAPOLATE',
  STORAGE_ERROR = 'STORAGE_ERROR',
}

export type PredictionMethod = 'usage' | 'calendar';

export class PredictionErrorDto {
  @ApiProperty({ enum: PredictionErrorCode, example: PredictionErrorCode.CANNOT_EXTRAPOLATE })
  code!: PredictionErrorCode;

  @ApiProperty({ example: 'No usage accrued since 2025-06-01; rate is zero' })
  message!: string;
}

/**
 * Forecast for one (entity, task) pair.
 * Callers tell success from failure by `error` alone.
 */
export class PredictionResultDto {
  @ApiProperty({ example: 'RMG04' })
  entityId!: string;

  @ApiProperty({ enum: EntityType, example: EntityType.CRANE })
  entityType!: EntityType;

  @ApiProperty({ example: 'hoist_rope_inspection' })
  taskId!: string;

  @ApiProperty({
    enum: ['usage', 'calendar'],
    nullable: true,
    description: 'How the date was derived',
  })
  method!: PredictionMethod | null;

  @ApiProperty({ example: '2026-06-01', nullable: true, type: String })
  predictedDate!: string | null;

  @ApiProperty({
    description: 'Days until due; negative when overdue',
    example: 42.5,
    nullable: true,
    type: Number,
  })
  daysRemaining!: number | null;

  @ApiProperty({
    description: 'Usage accrued since the baseline (0 for calendar tasks)',
    example: 84500,
  })
  currentValue!: number;

  @ApiProperty({
    description: 'Start of the usage or calendar window (ISO 8601)',
    example: '2025-06-01T10:00:00.000Z',
    nullable: true,
    type: String,
  })
  baselineDate!: string | null;

  @ApiProperty({ type: PredictionErrorDto, nullable: true })
  error!: PredictionErrorDto | null;
}
