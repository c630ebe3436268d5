import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBody } from '@nestjs/swagger';
import { IngestionReportDto, RunIngestionDto } from '../../../dto';
import { LogIngestionService } from '../services/log-ingestion.service';

@ApiTags('ingestion')
@Controller('v1/ingestion')
export class IngestionController {
  constructor(private readonly ingestionService: LogIngestionService) {}

  @Post('runs')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Run a batch ingestion over the log directory',
    description:
      'Scans .log and .zip files newest first and stores one sample per recognised line. ' +
      'Re-running over the same files stores nothing new.',
  })
  @ApiBody({ type: RunIngestionDto, required: false })
  @ApiResponse({ status: 200, type: IngestionReportDto })
  @ApiResponse({ status: 404, description: 'Log directory or tag search list not found' })
  async run(@Body() dto: RunIngestionDto): Promise<IngestionReportDto> {
    return this.ingestionService.run({
      directory: dto.directory,
      maxFiles: dto.maxFiles,
      rebuild: dto.rebuild,
    });
  }
}
