import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsDateString,
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { EntityType } from '../entities';

/**
 * DTO for recording a completed maintenance action
 */
export class LogServiceDto {
  @ApiProperty({
    description: 'Equipment identifier (crane code or spreader id)',
    example: 'RMG04',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  entityId!: string;

  @ApiProperty({
    enum: EntityType,
    description: 'Equipment class',
    example: EntityType.CRANE,
  })
  @IsEnum(EntityType)
  entityType!: EntityType;

  @ApiProperty({
    description: 'Task identifier from the task configuration table',
    example: 'hoist_rope_inspection',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  taskId!: string;

  @ApiProperty({
    description: 'When the service was completed (ISO 8601)',
    example: '2025-06-01T10:00:00.000Z',
  })
  @IsDateString()
  serviceDate!: string;

  @ApiPropertyOptional({
    description: 'Cumulative usage counter at time of service',
    example: 100000,
  })
  @IsOptional()
  @IsNumber()
  @Min(0)
  servicedAtValue?: number;

  @ApiPropertyOptional({
    description: 'Technician or team who performed the service',
    example: 'maintenance-team-a',
  })
  @IsOptional()
  @IsString()
  @MaxLength(128)
  servicedBy?: string;

  @ApiPropertyOptional({
    description: 'Time spent on the service in hours',
    example: 2.5,
  })
  @IsOptional()
  @IsNumber()
  @Min(0)
  durationHours?: number;
}

export class ServiceHistoryQueryDto {
  @ApiPropertyOptional({
    description: 'Restrict history to one task',
    example: 'hoist_rope_inspection',
  })
  @IsOptional()
  @IsString()
  taskId?: string;
}
