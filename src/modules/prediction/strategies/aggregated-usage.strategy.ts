import { Injectable } from '@nestjs/common';
import { PredictionErrorCode } from '../../../dto';
import { EquipmentAssignmentStore } from '../../equipment/stores/equipment-assignment.store';
import { TimeSeriesStore } from '../../time-series/stores/time-series.store';
import { UsageOutcome, UsageQuery, UsageStrategy } from './usage-strategy';

interface MemberUsage {
  netIncrease: number;
  firstSampleAt: Date | null;
  hasSamples: boolean;
}

/**
 * Spreaders: no counter of their own, so usage is the sum of the net
 * increase on every crane the spreader is assigned to. A servicedAtValue
 * on the spreader's record is a single-crane reading and is not used.
 */
@Injectable()
export class AggregatedUsageStrategy extends UsageStrategy {
  constructor(
    private readonly timeSeries: TimeSeriesStore,
    private readonly assignments: EquipmentAssignmentStore,
  ) {
    super();
  }

  async resolveUsage({ entityId, metricName, lastService }: UsageQuery): Promise<UsageOutcome> {
    const members = await this.assignments.getMembers(entityId);
    if (members.length === 0) {
      return {
        ok: false,
        code: PredictionErrorCode.NO_ASSIGNMENTS,
        message: `Spreader ${entityId} is not assigned to any crane`,
      };
    }

    const since = lastService?.serviceDate ?? null;
    const perMember = await Promise.all(
      members.map((memberId) => this.memberUsage(memberId, metricName, since)),
    );

    if (!perMember.some((member) => member.hasSamples)) {
      return {
        ok: false,
        code: PredictionErrorCode.NO_TELEMETRY,
        message: `No numeric samples of ${metricName} on cranes ${members.join(', ')}`,
      };
    }

    const usage = perMember.reduce((sum, member) => sum + member.netIncrease, 0);

    let baselineDate = since;
    if (!baselineDate) {
      const firstSamples = perMember
        .map((member) => member.firstSampleAt)
        .filter((at): at is Date => at !== null)
        .map((at) => at.getTime());
      baselineDate = new Date(Math.min(...firstSamples));
    }

    return { ok: true, usage, baselineDate };
  }

  private async memberUsage(
    memberId: string,
    metricName: string,
    since: Date | null,
  ): Promise<MemberUsage> {
    const latest = await this.timeSeries.getLatestNumeric(memberId, metricName);
    if (!latest) {
      return { netIncrease: 0, firstSampleAt: null, hasSamples: false };
    }

    if (since) {
      const before = await this.timeSeries.getNumericAtOrBefore(memberId, metricName, since);
      return {
        netIncrease: latest.value - (before?.value ?? 0),
        firstSampleAt: null,
        hasSamples: true,
      };
    }

    const earliest = await this.timeSeries.getEarliestNumeric(memberId, metricName);
    return {
      netIncrease: latest.value - (earliest?.value ?? latest.value),
      firstSampleAt: earliest?.timestamp ?? latest.timestamp,
      hasSamples: true,
    };
  }
}
