import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Put,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { AssignmentPair, EquipmentAssignmentStore } from '../stores/equipment-assignment.store';

@ApiTags('assignments')
@Controller('v1/assignments')
export class EquipmentAssignmentController {
  constructor(private readonly assignments: EquipmentAssignmentStore) {}

  @Get()
  @ApiOperation({ summary: 'List every spreader -> crane assignment' })
  async list(): Promise<AssignmentPair[]> {
    return this.assignments.listAssignments();
  }

  @Get(':spreaderId')
  @ApiOperation({
    summary: 'List cranes a spreader has operated on',
    description: 'Usage of the spreader is aggregated across these cranes.',
  })
  @ApiParam({ name: 'spreaderId', example: '29747' })
  async getMembers(
    @Param('spreaderId') spreaderId: string,
  ): Promise<{ spreaderId: string; cranes: string[] }> {
    return { spreaderId, cranes: await this.assignments.getMembers(spreaderId) };
  }

  @Put(':spreaderId/cranes/:craneId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Assign a spreader to a crane (idempotent)' })
  @ApiParam({ name: 'spreaderId', example: '29747' })
  @ApiParam({ name: 'craneId', example: 'RMG07' })
  @ApiResponse({ status: 200, description: 'Assignment recorded' })
  async assign(
    @Param('spreaderId') spreaderId: string,
    @Param('craneId') craneId: string,
  ): Promise<{ success: boolean }> {
    await this.assignments.assign(spreaderId, craneId);
    return { success: true };
  }

  @Delete(':spreaderId/cranes/:craneId')
  @ApiOperation({ summary: 'Remove a spreader -> crane assignment' })
  @ApiParam({ name: 'spreaderId', example: '29747' })
  @ApiParam({ name: 'craneId', example: 'RMG07' })
  async unassign(
    @Param('spreaderId') spreaderId: string,
    @Param('craneId') craneId: string,
  ): Promise<{ removed: boolean }> {
    return { removed: await this.assignments.unassign(spreaderId, craneId) };
  }
}
