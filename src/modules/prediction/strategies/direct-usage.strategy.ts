import { Injectable } from '@nestjs/common';
import { PredictionErrorCode } from '../../../dto';
import { TimeSeriesStore } from '../../time-series/stores/time-series.store';
import { UsageOutcome, UsageQuery, UsageStrategy } from './usage-strategy';

/**
 * Cranes: usage is read straight from the crane's own counter
 */
@Injectable()
export class DirectUsageStrategy extends UsageStrategy {
  constructor(private readonly timeSeries: TimeSeriesStore) {
    super();
  }

  async resolveUsage({ entityId, metricName, lastService }: UsageQuery): Promise<UsageOutcome> {
    const latest = await this.timeSeries.getLatestNumeric(entityId, metricName);
    if (!latest) {
      return {
        ok: false,
        code: PredictionErrorCode.NO_TELEMETRY,
        message: `No numeric samples of ${metricName} for ${entityId}`,
      };
    }

    if (lastService) {
      let baseline = lastService.servicedAtValue;
      if (baseline === null) {
        const before = await this.timeSeries.getNumericAtOrBefore(
          entityId,
          metricName,
          lastService.serviceDate,
        );
        baseline = before?.value ?? 0;
      }
      return { ok: true, usage: latest.value - baseline, baselineDate: lastService.serviceDate };
    }

    const earliest = await this.timeSeries.getEarliestNumeric(entityId, metricName);
    if (!earliest) {
      return {
        ok: false,
        code: PredictionErrorCode.NO_TELEMETRY,
        message: `No numeric samples of ${metricName} for ${entityId}`,
      };
    }
    return { ok: true, usage: latest.value - earliest.value, baselineDate: earliest.timestamp };
  }
}
