import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { TaskConfigDto } from '../../../dto';
import { TaskConfig, TaskConfigRegistry } from '../task-config.registry';

@ApiTags('tasks')
@Controller('v1/tasks')
export class TasksController {
  constructor(private readonly registry: TaskConfigRegistry) {}

  @Get()
  @ApiOperation({
    summary: 'List maintainable tasks',
    description: 'Task definitions loaded from the task configuration table at startup.',
  })
  @ApiResponse({ status: 200, type: [TaskConfigDto] })
  list(): TaskConfig[] {
    return this.registry.list();
  }

  @Get(':taskId')
  @ApiOperation({ summary: 'Get one task definition' })
  @ApiParam({ name: 'taskId', example: 'hoist_rope_inspection' })
  @ApiResponse({ status: 200, type: TaskConfigDto })
  @ApiResponse({ status: 404, description: 'Unknown task' })
  get(@Param('taskId') taskId: string): TaskConfig {
    const task = this.registry.get(taskId);

    if (!task) {
      throw new NotFoundException(`Task ${taskId} is not configured`);
    }

    return task;
  }
}
