/**
 * Equipment classes tracked by the engine
 */
export enum EntityType {
  CRANE = 'crane',
  SPREADER = 'spreader',
}
