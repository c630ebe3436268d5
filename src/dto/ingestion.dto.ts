import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';

/**
 * Options for one batch ingestion run
 */
export class RunIngestionDto {
  @ApiPropertyOptional({
    description: 'Directory to scan (defaults to LOG_DIRECTORY)',
    example: '/data/crane-logs',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  directory?: string;

  @ApiPropertyOptional({
    description: 'Maximum number of files to scan, newest first (defaults to INGEST_MAX_FILES)',
    example: 50,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxFiles?: number;

  @ApiPropertyOptional({
    description: 'Delete every stored sample before scanning',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  rebuild?: boolean;
}

/**
 * Summary of one batch ingestion run
 */
export class IngestionReportDto {
  @ApiProperty({ example: 'a1b2c3d4' })
  runId!: string;

  @ApiProperty({ example: '2026-02-12T10:30:00.000Z' })
  startedAt!: string;

  @ApiProperty({ example: '2026-02-12T10:31:12.000Z' })
  finishedAt!: string;

  @ApiProperty({ example: '/data/crane-logs' })
  directory!: string;

  @ApiProperty({ description: 'Log and zip files found in the directory', example: 120 })
  filesDiscovered!: number;

  @ApiProperty({ description: 'Files scanned (after the max-files cap)', example: 50 })
  filesProcessed!: number;

  @ApiProperty({ description: 'Files or archive entries that could not be read', example: 0 })
  filesFailed!: number;

  @ApiProperty({ example: 2500000 })
  linesScanned!: number;

  @ApiProperty({ description: 'Lines that passed the substring pre-filter', example: 4200 })
  candidateLines!: number;

  @ApiProperty({ example: 4100 })
  samplesInserted!: number;

  @ApiProperty({ description: 'Samples whose natural key already existed', example: 90 })
  duplicateSamples!: number;

  @ApiProperty({ description: 'Candidate lines not matching the log grammar', example: 6 })
  parseFailures!: number;

  @ApiProperty({ example: 4 })
  timestampFailures!: number;

  @ApiProperty({ example: 0 })
  writeFailures!: number;

  @ApiProperty({ type: [String], description: 'First warnings raised during the run' })
  warnings!: string[];
}
