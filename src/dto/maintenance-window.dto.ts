import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsDateString,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { EntityType } from '../entities';

/**
 * DTO for a planned maintenance window (written by the plan importer)
 */
export class CreateMaintenanceWindowDto {
  @ApiProperty({ description: 'Equipment identifier', example: 'RMG05' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  entityId!: string;

  @ApiProperty({ enum: EntityType, example: EntityType.CRANE })
  @IsEnum(EntityType)
  entityType!: EntityType;

  @ApiProperty({ description: 'Window start (ISO 8601)', example: '2025-09-01T07:00:00.000Z' })
  @IsDateString()
  fromDatetime!: string;

  @ApiProperty({ description: 'Window end (ISO 8601)', example: '2025-09-01T12:00:00.000Z' })
  @IsDateString()
  toDatetime!: string;

  @ApiPropertyOptional({ description: 'Service type code from the plan', example: 'A' })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  serviceType?: string;

  @ApiPropertyOptional({ example: 'Weekly inspection' })
  @IsOptional()
  @IsString()
  taskDescription?: string;

  @ApiPropertyOptional({ example: 'Crane-Stacking, west block' })
  @IsOptional()
  @IsString()
  notes?: string;
}

/**
 * Filters for listing maintenance windows
 */
export class MaintenanceWindowQueryDto {
  @ApiPropertyOptional({ example: 'RMG05' })
  @IsOptional()
  @IsString()
  entityId?: string;

  @ApiPropertyOptional({
    description: 'Only windows ending at or after this instant',
    example: '2025-09-01T00:00:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  from?: string;

  @ApiPropertyOptional({
    description: 'Only windows starting at or before this instant',
    example: '2025-09-30T23:59:59.000Z',
  })
  @IsOptional()
  @IsDateString()
  to?: string;
}
