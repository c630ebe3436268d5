import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsOptional } from 'class-validator';

/**
 * Query parameters for a sample range lookup
 */
export class SampleRangeQueryDto {
  @ApiPropertyOptional({
    description: 'Inclusive range start (ISO 8601). Defaults to the epoch.',
    example: '2025-06-01T00:00:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  start?: string;

  @ApiPropertyOptional({
    description: 'Inclusive range end (ISO 8601). Defaults to now.',
    example: '2025-07-01T00:00:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  end?: string;
}

export class MetricReadingDto {
  @ApiProperty({
    description: 'Reading time (ISO 8601, UTC)',
    example: '2025-06-14T08:12:45.123Z',
  })
  timestamp!: string;

  @ApiProperty({
    description: 'Payload as recorded in the log',
    example: '184233',
  })
  value!: string;

  @ApiProperty({
    description: 'Payload parsed as a number, null if not numeric',
    example: 184233,
    nullable: true,
    type: Number,
  })
  numericValue!: number | null;
}
