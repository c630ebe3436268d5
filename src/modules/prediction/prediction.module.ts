import { Module } from '@nestjs/common';
import { Clock } from '../../common/clock';
import { TimeSeriesModule } from '../time-series/time-series.module';
import { ServiceLogModule } from '../service-log/service-log.module';
import { EquipmentModule } from '../equipment/equipment.module';
import { TasksModule } from '../tasks/tasks.module';
import { DirectUsageStrategy } from './strategies/direct-usage.strategy';
import { AggregatedUsageStrategy } from './strategies/aggregated-usage.strategy';
import { PredictionService } from './services/prediction.service';
import { PredictionController } from './controllers/prediction.controller';

@Module({
  imports: [TimeSeriesModule, ServiceLogModule, EquipmentModule, TasksModule],
  controllers: [PredictionController],
  providers: [Clock, DirectUsageStrategy, AggregatedUsageStrategy, PredictionService],
  exports: [PredictionService],
})
export class PredictionModule {}
