import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { DataSource } from 'typeorm';
import { describeError } from '../../common/errors';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private readonly dataSource: DataSource) {}

  @Get()
  @ApiOperation({
    summary: 'Health check',
    description: 'API status, database connectivity and applied migrations.',
  })
  @ApiResponse({
    status: 200,
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        timestamp: { type: 'string', example: '2026-02-12T10:30:00.000Z' },
        database: { type: 'string', example: 'connected' },
        pendingMigrations: { type: 'boolean', example: false },
        uptime: { type: 'number', example: 3600 },
      },
    },
  })
  async check() {
    let database = 'disconnected';
    let pendingMigrations: boolean | null = null;

    try {
      if (this.dataSource.isInitialized) {
        await this.dataSource.query('SELECT 1');
        database = 'connected';
        pendingMigrations = await this.dataSource.showMigrations();
      }
    } catch (error) {
      database = `error: ${describeError(error)}`;
    }

    return {
      status: database === 'connected' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      database,
      pendingMigrations,
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiOperation({ summary: 'Readiness check' })
  @ApiResponse({ status: 503, description: 'Database not initialized' })
  async ready() {
    if (!this.dataSource.isInitialized) {
      throw new ServiceUnavailableException('Database not initialized');
    }

    return {
      status: 'ready',
      timestamp: new Date().toISOString(),
    };
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness check' })
  async live() {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
      pid: process.pid,
    };
  }
}
