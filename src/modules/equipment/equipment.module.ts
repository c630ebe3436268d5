import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EquipmentAssignment } from '../../entities';
import { EquipmentAssignmentStore } from './stores/equipment-assignment.store';
import { TypeOrmEquipmentAssignmentStore } from './stores/typeorm-equipment-assignment.store';
import { EquipmentAssignmentController } from './controllers/equipment-assignment.controller';

@Module({
  imports: [TypeOrmModule.forFeature([EquipmentAssignment])],
  controllers: [EquipmentAssignmentController],
  providers: [{ provide: EquipmentAssignmentStore, useClass: TypeOrmEquipmentAssignmentStore }],
  exports: [EquipmentAssignmentStore],
})
export class EquipmentModule {}
