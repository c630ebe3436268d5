import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ServiceLogRecord } from '../../entities';
import { ServiceLogStore } from './stores/service-log.store';
import { TypeOrmServiceLogStore } from './stores/typeorm-service-log.store';
import { ServiceLogController } from './controllers/service-log.controller';

@Module({
  imports: [TypeOrmModule.forFeature([ServiceLogRecord])],
  controllers: [ServiceLogController],
  providers: [{ provide: ServiceLogStore, useClass: TypeOrmServiceLogStore }],
  exports: [ServiceLogStore],
})
export class ServiceLogModule {}
