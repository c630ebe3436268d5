import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TaskConfigRegistry, loadTaskConfigRegistry } from './task-config.registry';
import { TasksController } from './controllers/tasks.controller';

@Module({
  controllers: [TasksController],
  providers: [
    {
      provide: TaskConfigRegistry,
      useFactory: (configService: ConfigService) =>
        loadTaskConfigRegistry(
          configService.get<string>('TASK_CONFIG_FILE', './data/service_config.csv'),
        ),
      inject: [ConfigService],
    },
  ],
  exports: [TaskConfigRegistry],
})
export class TasksModule {}
