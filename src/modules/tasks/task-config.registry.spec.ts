import { join } from 'path';
import { tmpdir } from 'os';
import { loadTaskConfigRegistry, parseTaskConfigTable, TaskConfigRegistry } from './task-config.registry';
import { RecordingLogger } from '../../../test/support/recording-logger';

const TABLE = [
  'task_id,action_required,category,tag_name,service_limit,service_interval_days,unit,duration_hours',
  'hoist_rope,Inspect ropes,Hoist,hoist_cycles,120000,,cycles,2',
  'cabin_filter,Replace filter,Cabin,,,90,,0.5',
  'bad_limit,Check,Hoist,hoist_cycles,abc,,cycles,',
  'hoist_rope,Duplicate,Hoist,hoist_cycles,1,,cycles,',
  ',Missing id,,,,,,',
].join('\n');

describe('parseTaskConfigTable', () => {
  const { tasks, errors } = parseTaskConfigTable(TABLE);

  it('classifies usage and calendar tasks', () => {
    expect(tasks).toEqual([
      {
        taskId: 'hoist_rope',
        actionRequired: 'Inspect ropes',
        category: 'Hoist',
        kind: 'usage',
        tagName: 'hoist_cycles',
        serviceLimit: 120000,
        serviceIntervalDays: null,
        unit: 'cycles',
        durationHours: 2,
      },
      {
        taskId: 'cabin_filter',
        actionRequired: 'Replace filter',
        category: 'Cabin',
        kind: 'calendar',
        tagName: '',
        serviceLimit: null,
        serviceIntervalDays: 90,
        unit: '',
        durationHours: 0.5,
      },
    ]);
  });

  it('reports invalid and duplicate rows by line', () => {
    expect(errors).toHaveLength(3);
    expect(errors[0]).toMatch(/^line 4: .*service_limit must be a number/);
    expect(errors[1]).toBe("line 5: duplicate task_id 'hoist_rope'");
    expect(errors[2]).toMatch(/^line 6: /);
  });
});

describe('TaskConfigRegistry', () => {
  const registry = TaskConfigRegistry.fromTasks(parseTaskConfigTable(TABLE).tasks);

  it('looks tasks up by id', () => {
    expect(registry.get('cabin_filter')?.serviceIntervalDays).toBe(90);
    expect(registry.get('unknown')).toBeUndefined();
    expect(registry.has('hoist_rope')).toBe(true);
  });

  it('lists tasks in table order', () => {
    expect(registry.list().map((t) => t.taskId)).toEqual(['hoist_rope', 'cabin_filter']);
    expect(registry.size).toBe(2);
  });

  it('loads an empty registry when the table is missing', async () => {
    const logger = new RecordingLogger();

    const loaded = await loadTaskConfigRegistry(join(tmpdir(), 'no-such-table.csv'), logger);

    expect(loaded.size).toBe(0);
    expect(logger.errors).toHaveLength(1);
  });
});
