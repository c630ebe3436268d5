import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityType, ServiceLogRecord } from '../../../entities';
import { PredictionErrorCode, PredictionResultDto } from '../../../dto';
import { DualLimitPolicy } from '../../../config/env.validation';
import { Clock } from '../../../common/clock';
import { addDays, diffUtcDays, MS_PER_DAY, startOfUtcDay, toIsoDate } from '../../../common/dates';
import { describeError } from '../../../common/errors';
import { ServiceLogStore } from '../../service-log/stores/service-log.store';
import { TaskConfig, TaskConfigRegistry } from '../../tasks/task-config.registry';
import { UsageStrategy } from '../strategies/usage-strategy';
import { DirectUsageStrategy } from '../strategies/direct-usage.strategy';
import { AggregatedUsageStrategy } from '../strategies/aggregated-usage.strategy';

type PredictionKey = Pick<PredictionResultDto, 'entityId' | 'entityType' | 'taskId'>;

/**
 * Usage-side outcomes caused by missing or flat telemetry rather than by
 * task configuration; under the earliest policy these yield to the calendar
 * forecast.
 */
const USAGE_DATA_ERRORS: ReadonlySet<PredictionErrorCode> = new Set([
  PredictionErrorCode.NO_BASELINE,
  PredictionErrorCode.NO_TELEMETRY,
  PredictionErrorCode.NO_ASSIGNMENTS,
  PredictionErrorCode.CANNOT_EXTRAPOLATE,
]);

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Due-date forecasting for maintenance tasks.
 *
 * Calendar tasks: last service date + interval.
 * Usage tasks: linear extrapolation of usage accrued since the baseline
 * until the service limit is reached.
 *
 * Every failure is returned in PredictionResult.error; nothing here throws.
 */
@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);
  private readonly strategies: Record<EntityType, UsageStrategy>;
  private readonly dualLimitPolicy: DualLimitPolicy;

  constructor(
    private readonly tasks: TaskConfigRegistry,
    private readonly serviceLog: ServiceLogStore,
    private readonly clock: Clock,
    directUsage: DirectUsageStrategy,
    aggregatedUsage: AggregatedUsageStrategy,
    configService: ConfigService,
  ) {
    this.strategies = {
      [EntityType.CRANE]: directUsage,
      [EntityType.SPREADER]: aggregatedUsage,
    };
    this.dualLimitPolicy = configService.get<DualLimitPolicy>(
      'PREDICTION_DUAL_LIMIT_POLICY',
      DualLimitPolicy.USAGE_ONLY,
    );
  }

  async predictServiceDate(
    entityId: string,
    entityType: EntityType,
    taskId: string,
  ): Promise<PredictionResultDto> {
    const key: PredictionKey = { entityId, entityType, taskId };

    const task = this.tasks.get(taskId);
    if (!task) {
      return this.failure(key, PredictionErrorCode.UNKNOWN_TASK, `Task '${taskId}' is not configured`);
    }

    try {
      return await this.predictTask(key, task);
    } catch (error) {
      this.logger.error(
        `Prediction failed for ${entityType} ${entityId} / ${taskId}: ${describeError(error)}`,
      );
      return this.failure(key, PredictionErrorCode.STORAGE_ERROR, describeError(error));
    }
  }

  /**
   * One forecast per configured task, in registry order
   */
  async predictAll(entityId: string, entityType: EntityType): Promise<PredictionResultDto[]> {
    return Promise.all(
      this.tasks.list().map((task) => this.predictServiceDate(entityId, entityType, task.taskId)),
    );
  }

  private async predictTask(key: PredictionKey, task: TaskConfig): Promise<PredictionResultDto> {
    const lastService = await this.serviceLog.getLastServiceRecord(
      key.entityId,
      key.entityType,
      key.taskId,
    );

    if (task.kind === 'calendar') {
      return this.calendarForecast(key, task, lastService);
    }

    const usage = await this.usageForecast(key, task, lastService);

    if (
      this.dualLimitPolicy !== DualLimitPolicy.EARLIEST ||
      task.serviceIntervalDays === null ||
      !lastService
    ) {
      return usage;
    }

    const calendar = this.calendarForecast(key, task, lastService);
    if (usage.error && USAGE_DATA_ERRORS.has(usage.error.code)) {
      return calendar;
    }
    if (usage.error || calendar.error || !usage.predictedDate || !calendar.predictedDate) {
      return usage;
    }
    // ISO dates compare lexically
    return calendar.predictedDate < usage.predictedDate ? calendar : usage;
  }

  private calendarForecast(
    key: PredictionKey,
    task: TaskConfig,
    lastService: ServiceLogRecord | null,
  ): PredictionResultDto {
    if (task.serviceIntervalDays === null) {
      return this.failure(
        key,
        PredictionErrorCode.INVALID_TASK_CONFIG,
        `Task '${task.taskId}' has neither a usage limit nor a service interval`,
      );
    }
    if (!lastService) {
      return this.failure(
        key,
        PredictionErrorCode.NO_BASELINE,
        `No service recorded for ${key.entityType} ${key.entityId} / ${task.taskId}`,
      );
    }

    const due = addDays(startOfUtcDay(lastService.serviceDate), task.serviceIntervalDays);

    return {
      ...key,
      method: 'calendar',
      predictedDate: toIsoDate(due),
      daysRemaining: diffUtcDays(this.clock.now(), due),
      currentValue: 0,
      baselineDate: lastService.serviceDate.toISOString(),
      error: null,
    };
  }

  private async usageForecast(
    key: PredictionKey,
    task: TaskConfig,
    lastService: ServiceLogRecord | null,
  ): Promise<PredictionResultDto> {
    if (task.serviceLimit === null || task.serviceLimit <= 0) {
      return this.failure(
        key,
        PredictionErrorCode.INVALID_TASK_CONFIG,
        `Task '${task.taskId}' needs a positive service limit`,
      );
    }

    const outcome = await this.strategies[key.entityType].resolveUsage({
      entityId: key.entityId,
      metricName: task.tagName,
      lastService,
    });
    if (!outcome.ok) {
      return this.failure(key, outcome.code, outcome.message);
    }

    const { usage, baselineDate } = outcome;
    const now = this.clock.now();
    const elapsedDays = (now.getTime() - baselineDate.getTime()) / MS_PER_DAY;

    if (elapsedDays <= 0 || usage <= 0) {
      return {
        ...this.failure(
          key,
          PredictionErrorCode.CANNOT_EXTRAPOLATE,
          `Usage ${usage} over ${roundTo2(elapsedDays)} days gives no positive rate`,
        ),
        currentValue: usage,
        baselineDate: baselineDate.toISOString(),
      };
    }

    const rate = usage / elapsedDays;
    const daysRemaining = roundTo2((task.serviceLimit - usage) / rate);
    const due = addDays(now, daysRemaining);

    // Date holds at most 1e8 days either side of the epoch
    if (!Number.isFinite(due.getTime())) {
      return {
        ...this.failure(
          key,
          PredictionErrorCode.CANNOT_EXTRAPOLATE,
          `Usage rate ${rate} per day puts the due date out of range (${daysRemaining} days)`,
        ),
        currentValue: usage,
        baselineDate: baselineDate.toISOString(),
      };
    }

    return {
      ...key,
      method: 'usage',
      predictedDate: toIsoDate(due),
      daysRemaining,
      currentValue: usage,
      baselineDate: baselineDate.toISOString(),
      error: null,
    };
  }

  private failure(
    key: PredictionKey,
    code: PredictionErrorCode,
    message: string,
  ): PredictionResultDto {
    return {
      ...key,
      method: null,
      predictedDate: null,
      daysRemaining: null,
      currentValue: 0,
      baselineDate: null,
      error: { code, message },
    };
  }
}
