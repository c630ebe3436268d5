import { InitialSchema1760000000000 } from './1760000000000-InitialSchema';
import { ServiceDurationAndWindows1761000000000 } from './1761000000000-ServiceDurationAndWindows';

/**
 * Applied in order at startup; TypeORM records each in the migrations table
 */
export const MIGRATIONS = [
  InitialSchema1760000000000,
  ServiceDurationAndWindows1761000000000,
];
