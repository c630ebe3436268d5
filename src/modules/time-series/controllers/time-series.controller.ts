import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiParam,
} from '@nestjs/swagger';
import { TimeSeriesStore, MetricReading } from '../stores/time-series.store';
import { MetricReadingDto, SampleRangeQueryDto } from '../../../dto';

@ApiTags('samples')
@Controller('v1/samples')
export class TimeSeriesController {
  constructor(private readonly timeSeries: TimeSeriesStore) {}

  /**
   * GET /v1/samples/:entityId/:metricName
   *
   * Ordered readings for one equipment statistic within an inclusive range
   */
  @Get(':entityId/:metricName')
  @ApiOperation({
    summary: 'Get readings for a metric over a time range',
    description: 'Returns readings oldest first. An empty array means no data in the range.',
  })
  @ApiParam({ name: 'entityId', example: 'RMG04' })
  @ApiParam({ name: 'metricName', example: 'Hoist Cycles' })
  @ApiResponse({ status: 200, type: [MetricReadingDto] })
  async getValueRange(
    @Param('entityId') entityId: string,
    @Param('metricName') metricName: string,
    @Query() query: SampleRangeQueryDto,
  ): Promise<MetricReadingDto[]> {
    const start = query.start ? new Date(query.start) : new Date(0);
    const end = query.end ? new Date(query.end) : new Date();

    const readings = await this.timeSeries.getValueRange(entityId, metricName, start, end);
    return readings.map(toDto);
  }

  @Get(':entityId/:metricName/latest')
  @ApiOperation({ summary: 'Get the most recent reading for a metric' })
  @ApiParam({ name: 'entityId', example: 'RMG04' })
  @ApiParam({ name: 'metricName', example: 'Hoist Cycles' })
  @ApiResponse({ status: 200, type: MetricReadingDto })
  @ApiResponse({ status: 404, description: 'No readings recorded' })
  async getLatestValue(
    @Param('entityId') entityId: string,
    @Param('metricName') metricName: string,
  ): Promise<MetricReadingDto> {
    const reading = await this.timeSeries.getLatestValue(entityId, metricName);

    if (!reading) {
      throw new NotFoundException(`No readings of '${metricName}' for ${entityId}`);
    }

    return toDto(reading);
  }
}

function toDto(reading: MetricReading): MetricReadingDto {
  return {
    timestamp: reading.timestamp.toISOString(),
    value: reading.value,
    numericValue: reading.numericValue,
  };
}
