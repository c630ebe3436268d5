import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBody, ApiParam } from '@nestjs/swagger';
import { MaintenanceWindow } from '../../../entities';
import { CreateMaintenanceWindowDto, MaintenanceWindowQueryDto } from '../../../dto';
import { MaintenanceWindowsService } from '../services/maintenance-windows.service';

@ApiTags('maintenance-windows')
@Controller('v1/maintenance-windows')
export class MaintenanceWindowsController {
  constructor(private readonly windowsService: MaintenanceWindowsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Plan a maintenance window' })
  @ApiBody({ type: CreateMaintenanceWindowDto })
  @ApiResponse({ status: 201, description: 'Window planned' })
  @ApiResponse({ status: 400, description: 'Window ends before it starts' })
  @ApiResponse({ status: 409, description: 'Window already planned' })
  async create(@Body() dto: CreateMaintenanceWindowDto): Promise<MaintenanceWindow> {
    return this.windowsService.addWindow({
      entityId: dto.entityId,
      entityType: dto.entityType,
      fromDatetime: new Date(dto.fromDatetime),
      toDatetime: new Date(dto.toDatetime),
      serviceType: dto.serviceType,
      taskDescription: dto.taskDescription,
      notes: dto.notes,
    });
  }

  @Get()
  @ApiOperation({ summary: 'List planned windows, optionally by entity and overlapping range' })
  async list(@Query() query: MaintenanceWindowQueryDto): Promise<MaintenanceWindow[]> {
    return this.windowsService.listWindows({
      entityId: query.entityId,
      from: query.from ? new Date(query.from) : undefined,
      to: query.to ? new Date(query.to) : undefined,
    });
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Remove a planned window' })
  @ApiParam({ name: 'id', example: 3 })
  async remove(@Param('id', ParseIntPipe) id: number): Promise<{ deleted: boolean }> {
    return { deleted: await this.windowsService.deleteWindow(id) };
  }
}
