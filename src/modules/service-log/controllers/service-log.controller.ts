import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseEnumPipe,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBody,
  ApiParam,
} from '@nestjs/swagger';
import { EntityType, ServiceLogRecord } from '../../../entities';
import { LogServiceDto, ServiceHistoryQueryDto } from '../../../dto';
import { ServiceLogStore } from '../stores/service-log.store';

@ApiTags('service-log')
@Controller('v1/service-log')
export class ServiceLogController {
  constructor(private readonly serviceLog: ServiceLogStore) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Record a completed maintenance action',
    description: 'Appends to the service history. Earlier records for the same task are kept.',
  })
  @ApiBody({ type: LogServiceDto })
  @ApiResponse({ status: 201, description: 'Service recorded' })
  @ApiResponse({ status: 400, description: 'Validation error' })
  async logService(@Body() dto: LogServiceDto): Promise<ServiceLogRecord> {
    return this.serviceLog.logServiceCompleted({
      entityId: dto.entityId,
      entityType: dto.entityType,
      taskId: dto.taskId,
      serviceDate: new Date(dto.serviceDate),
      servicedAtValue: dto.servicedAtValue,
      servicedBy: dto.servicedBy,
      durationHours: dto.durationHours,
    });
  }

  @Get(':entityType/:entityId')
  @ApiOperation({ summary: 'List service history for an equipment item, newest first' })
  @ApiParam({ name: 'entityType', enum: EntityType })
  @ApiParam({ name: 'entityId', example: 'RMG04' })
  async listHistory(
    @Param('entityType', new ParseEnumPipe(EntityType)) entityType: EntityType,
    @Param('entityId') entityId: string,
    @Query() query: ServiceHistoryQueryDto,
  ): Promise<ServiceLogRecord[]> {
    return this.serviceLog.listServiceHistory(entityId, entityType, query.taskId);
  }

  @Get(':entityType/:entityId/:taskId/last')
  @ApiOperation({ summary: 'Get the authoritative last service for a task' })
  @ApiParam({ name: 'entityType', enum: EntityType })
  @ApiParam({ name: 'entityId', example: 'RMG04' })
  @ApiParam({ name: 'taskId', example: 'hoist_rope_inspection' })
  @ApiResponse({ status: 404, description: 'Task never serviced' })
  async getLast(
    @Param('entityType', new ParseEnumPipe(EntityType)) entityType: EntityType,
    @Param('entityId') entityId: string,
    @Param('taskId') taskId: string,
  ): Promise<ServiceLogRecord> {
    const record = await this.serviceLog.getLastServiceRecord(entityId, entityType, taskId);

    if (!record) {
      throw new NotFoundException(`No service recorded for ${entityType} ${entityId} / ${taskId}`);
    }

    return record;
  }

  @Delete(':id')
  @ApiOperation({
    summary: 'Delete a service log entry',
    description: 'Administrative correction. Returns deleted=false if the entry did not exist or could not be removed.',
  })
  @ApiParam({ name: 'id', example: 17 })
  async deleteEntry(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<{ deleted: boolean }> {
    return { deleted: await this.serviceLog.deleteServiceLog(id) };
  }
}
