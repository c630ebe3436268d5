import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Min,
} from 'class-validator';

export type TaskKind = 'usage' | 'calendar';

/**
 * CSV cells arrive as strings: blank means "not set", anything else must be numeric
 */
const toOptionalNumber = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : Number(trimmed);
};

/**
 * One row of the task configuration table, validated at load time.
 * Empty cells mean "not set".
 */
export class TaskConfigRowDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/^\S+$/, { message: 'task_id must not contain whitespace' })
  task_id!: string;

  @IsOptional()
  @IsString()
  action_required?: string;

  @IsOptional()
  @IsString()
  category?: string;

  @IsOptional()
  @IsString()
  tag_name?: string;

  @Transform(toOptionalNumber)
  @IsOptional()
  @IsNumber({ allowNaN: false }, { message: 'service_limit must be a number' })
  @Min(0)
  service_limit?: number;

  @Transform(toOptionalNumber)
  @IsOptional()
  @IsNumber({ allowNaN: false }, { message: 'service_interval_days must be a number' })
  @Min(0)
  service_interval_days?: number;

  @IsOptional()
  @IsString()
  unit?: string;

  @Transform(toOptionalNumber)
  @IsOptional()
  @IsNumber({ allowNaN: false }, { message: 'duration_hours must be a number' })
  @Min(0)
  duration_hours?: number;
}

/**
 * Validated, immutable task definition
 */
export class TaskConfigDto {
  @ApiProperty({ example: 'hoist_rope_inspection' })
  taskId!: string;

  @ApiProperty({ example: 'Inspect hoist ropes' })
  actionRequired!: string;

  @ApiProperty({ example: 'Hoist' })
  category!: string;

  @ApiProperty({ enum: ['usage', 'calendar'], example: 'usage' })
  kind!: TaskKind;

  @ApiProperty({
    description: 'Canonical metric driving usage prediction (empty for calendar tasks)',
    example: 'Hoist Cycles',
  })
  tagName!: string;

  @ApiProperty({ nullable: true, type: Number, example: 100000 })
  serviceLimit!: number | null;

  @ApiProperty({ nullable: true, type: Number, example: 365 })
  serviceIntervalDays!: number | null;

  @ApiProperty({ example: 'cycles' })
  unit!: string;

  @ApiProperty({ nullable: true, type: Number, example: 2 })
  durationHours!: number | null;
}
