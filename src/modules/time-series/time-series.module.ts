import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MetricSample } from '../../entities';
import { TimeSeriesStore } from './stores/time-series.store';
import { TypeOrmTimeSeriesStore } from './stores/typeorm-time-series.store';
import { TimeSeriesController } from './controllers/time-series.controller';

@Module({
  imports: [TypeOrmModule.forFeature([MetricSample])],
  controllers: [TimeSeriesController],
  providers: [{ provide: TimeSeriesStore, useClass: TypeOrmTimeSeriesStore }],
  exports: [TimeSeriesStore],
})
export class TimeSeriesModule {}
