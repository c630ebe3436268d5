import { readFile } from 'fs/promises';
import { Logger, LoggerService } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { parse } from 'csv-parse/sync';
import { TaskConfigRowDto, TaskKind } from '../../dto';
import { describeError } from '../../common/errors';

export interface TaskConfig {
  readonly taskId: string;
  readonly actionRequired: string;
  readonly category: string;
  readonly kind: TaskKind;
  readonly tagName: string;
  readonly serviceLimit: number | null;
  readonly serviceIntervalDays: number | null;
  readonly unit: string;
  readonly durationHours: number | null;
}

export interface TaskTableParseResult {
  tasks: TaskConfig[];
  errors: string[];
}

/**
 * Immutable registry of maintainable tasks keyed by taskId.
 * Unknown ids resolve to undefined; callers turn that into a structured error.
 */
export class TaskConfigRegistry {
  private constructor(private readonly tasks: ReadonlyMap<string, TaskConfig>) {}

  static fromTasks(tasks: TaskConfig[]): TaskConfigRegistry {
    return new TaskConfigRegistry(
      new Map(tasks.map((task) => [task.taskId, Object.freeze({ ...task })])),
    );
  }

  static empty(): TaskConfigRegistry {
    return new TaskConfigRegistry(new Map());
  }

  get(taskId: string): TaskConfig | undefined {
    return this.tasks.get(taskId);
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  /**
   * Tasks in table order
   */
  list(): TaskConfig[] {
    return [...this.tasks.values()];
  }

  get size(): number {
    return this.tasks.size;
  }
}

/**
 * Parse and validate the task table. Invalid or duplicate rows are
 * reported in `errors` and left out of `tasks`.
 */
export function parseTaskConfigTable(csvText: string): TaskTableParseResult {
  const tasks: TaskConfig[] = [];
  const errors: string[] = [];
  const seen = new Set<string>();

  const rows = toRecords(
    parse(csvText, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    }),
  );

  rows.forEach((row, index) => {
    // Header is line 1
    const line = index + 2;
    const dto = plainToInstance(TaskConfigRowDto, row);
    const violations = validateSync(dto);

    if (violations.length > 0) {
      const details = violations
        .map((v) => Object.values(v.constraints ?? {}).join(', '))
        .join('; ');
      errors.push(`line ${line}: ${details}`);
      return;
    }

    if (seen.has(dto.task_id)) {
      errors.push(`line ${line}: duplicate task_id '${dto.task_id}'`);
      return;
    }
    seen.add(dto.task_id);

    tasks.push(toTaskConfig(dto));
  });

  return { tasks, errors };
}

/**
 * Load the registry from disk. A missing or unreadable table yields an
 * empty registry; bad rows are logged and skipped.
 */
export async function loadTaskConfigRegistry(
  path: string,
  logger: LoggerService = new Logger(TaskConfigRegistry.name),
): Promise<TaskConfigRegistry> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    logger.error(`Task configuration '${path}' could not be read: ${describeError(error)}`);
    return TaskConfigRegistry.empty();
  }

  let result: TaskTableParseResult;
  try {
    result = parseTaskConfigTable(text);
  } catch (error) {
    logger.error(`Task configuration '${path}' is not valid CSV: ${describeError(error)}`);
    return TaskConfigRegistry.empty();
  }

  for (const message of result.errors) {
    logger.warn(`Skipping task row in '${path}', ${message}`);
  }

  logger.log(`Loaded ${result.tasks.length} task definitions from '${path}'`);
  return TaskConfigRegistry.fromTasks(result.tasks);
}

function toTaskConfig(row: TaskConfigRowDto): TaskConfig {
  const tagName = (row.tag_name ?? '').trim();
  const serviceLimit = row.service_limit ?? null;

  return {
    taskId: row.task_id,
    actionRequired: (row.action_required ?? '').trim(),
    category: (row.category ?? '').trim(),
    kind: tagName !== '' && serviceLimit !== null ? 'usage' : 'calendar',
    tagName,
    serviceLimit,
    serviceIntervalDays: row.service_interval_days ?? null,
    unit: (row.unit ?? '').trim(),
    durationHours: row.duration_hours ?? null,
  };
}

function toRecords(parsed: unknown): Array<Record<string, string>> {
  if (!Array.isArray(parsed)) {
    return [];
  }

  return parsed.filter(isStringRecord);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === 'string')
  );
}
