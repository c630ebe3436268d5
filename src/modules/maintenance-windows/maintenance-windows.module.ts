import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MaintenanceWindow } from '../../entities';
import { MaintenanceWindowsService } from './services/maintenance-windows.service';
import { MaintenanceWindowsController } from './controllers/maintenance-windows.controller';

@Module({
  imports: [TypeOrmModule.forFeature([MaintenanceWindow])],
  controllers: [MaintenanceWindowsController],
  providers: [MaintenanceWindowsService],
})
export class MaintenanceWindowsModule {}
