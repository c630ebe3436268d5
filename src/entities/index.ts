import { MetricSample } from './metric-sample.entity';
import { ServiceLogRecord } from './service-log.entity';
import { EquipmentAssignment } from './equipment-assignment.entity';
import { MaintenanceWindow } from './maintenance-window.entity';

export { EntityType } from './entity-type';
export { MetricSample, ServiceLogRecord, EquipmentAssignment, MaintenanceWindow };

export const ENTITIES = [
  MetricSample,
  ServiceLogRecord,
  EquipmentAssignment,
  MaintenanceWindow,
];
