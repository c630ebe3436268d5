import { ServiceLogRecord } from '../../../entities';
import { PredictionErrorCode } from '../../../dto';

export interface UsageQuery {
  entityId: string;
  metricName: string;
  lastService: ServiceLogRecord | null;
}

export type UsageOutcome =
  | { ok: true; usage: number; baselineDate: Date }
  | { ok: false; code: PredictionErrorCode; message: string };

/**
 * Usage accrued by an entity since its baseline (last service, or first
 * sample when it was never serviced). One implementation per EntityType.
 */
export abstract class UsageStrategy {
  abstract resolveUsage(query: UsageQuery): Promise<UsageOutcome>;
}
