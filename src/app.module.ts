import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { validateEnvironment } from './config/env.validation';
import { buildDataSourceOptions } from './config/database.config';
import { TimeSeriesModule } from './modules/time-series/time-series.module';
import { IngestionModule } from './modules/ingestion/ingestion.module';
import { ServiceLogModule } from './modules/service-log/service-log.module';
import { EquipmentModule } from './modules/equipment/equipment.module';
import { TasksModule } from './modules/tasks/tasks.module';
import { PredictionModule } from './modules/prediction/prediction.module';
import { MaintenanceWindowsModule } from './modules/maintenance-windows/maintenance-windows.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    // Configuration module - loads .env, validated once at boot
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '.env.example'],
      validate: validateEnvironment,
    }),

    // TypeORM database connection; migrations run on startup
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) =>
        buildDataSourceOptions({
          host: configService.get<string>('DB_HOST', 'localhost'),
          port: configService.get<number>('DB_PORT', 5432),
          username: configService.get<string>('DB_USERNAME', 'postgres'),
          password: configService.get<string>('DB_PASSWORD', 'postgres'),
          database: configService.get<string>('DB_NAME', 'crane_maintenance'),
          ssl: configService.get<string>('DB_SSL') === 'true',
          logging: configService.get<string>('NODE_ENV') === 'development',
        }),
      inject: [ConfigService],
    }),

    // Feature modules
    TimeSeriesModule,
    IngestionModule,
    ServiceLogModule,
    EquipmentModule,
    TasksModule,
    PredictionModule,
    MaintenanceWindowsModule,
    HealthModule,
  ],
})
export class AppModule {}
