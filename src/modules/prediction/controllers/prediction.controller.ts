import { Controller, Get, Param, ParseEnumPipe } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { EntityType } from '../../../entities';
import { PredictionResultDto } from '../../../dto';
import { PredictionService } from '../services/prediction.service';

@ApiTags('predictions')
@Controller('v1/predictions')
export class PredictionController {
  constructor(private readonly predictionService: PredictionService) {}

  @Get(':entityType/:entityId')
  @ApiOperation({
    summary: 'Forecast every configured task for an equipment item',
    description: 'Failed forecasts are returned with an error code rather than an HTTP error.',
  })
  @ApiParam({ name: 'entityType', enum: EntityType })
  @ApiParam({ name: 'entityId', example: 'RMG04' })
  @ApiResponse({ status: 200, type: [PredictionResultDto] })
  async predictAll(
    @Param('entityType', new ParseEnumPipe(EntityType)) entityType: EntityType,
    @Param('entityId') entityId: string,
  ): Promise<PredictionResultDto[]> {
    return this.predictionService.predictAll(entityId, entityType);
  }

  @Get(':entityType/:entityId/:taskId')
  @ApiOperation({ summary: 'Forecast the next due date of one task' })
  @ApiParam({ name: 'entityType', enum: EntityType })
  @ApiParam({ name: 'entityId', example: 'RMG04' })
  @ApiParam({ name: 'taskId', example: 'hoist_rope_inspection' })
  @ApiResponse({ status: 200, type: PredictionResultDto })
  async predict(
    @Param('entityType', new ParseEnumPipe(EntityType)) entityType: EntityType,
    @Param('entityId') entityId: string,
    @Param('taskId') taskId: string,
  ): Promise<PredictionResultDto> {
    return this.predictionService.predictServiceDate(entityId, entityType, taskId);
  }
}
