import { Module } from '@nestjs/common';
import { TimeSeriesModule } from '../time-series/time-series.module';
import { LogFileSource } from './sources/log-file-source';
import { LogIngestionService } from './services/log-ingestion.service';
import { IngestionController } from './controllers/ingestion.controller';

@Module({
  imports: [TimeSeriesModule],
  controllers: [IngestionController],
  providers: [LogIngestionService, LogFileSource],
  exports: [LogIngestionService],
})
export class IngestionModule {}
