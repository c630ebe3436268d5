export * from './samples.dto';
export * from './service-log.dto';
export * from './ingestion.dto';
export * from './prediction.dto';
export * from './task-config.dto';
export * from './maintenance-window.dto';
