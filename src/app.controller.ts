import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { APP_CONFIG, AppConfig } from './config/configuration';
import { DatabaseService } from './database/database.service';

export const APP_VERSION = '1.0.0';

export type DatabaseStatus = 'healthy' | 'unhealthy' | 'disabled';

export interface HealthStatus {
  status: 'healthy';
  version: string;
  env: string;
  storage: AppConfig['storageBackend'];
  database: DatabaseStatus;
  timestamp: string;
}

@ApiTags('health')
@Controller()
export class AppController {
  constructor(
    private readonly databaseService: DatabaseService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Get('health')
  @ApiOperation({ summary: 'Service and database health' })
  async health(): Promise<HealthStatus> {
    let database: DatabaseStatus = 'disabled';
    if (this.config.storageBackend === 'postgres') {
      database = (await this.databaseService.ping()) ? 'healthy' : 'unhealthy';
    }

    return {
      status: 'healthy',
      version: APP_VERSION,
      env: this.config.env,
      storage: this.config.storageBackend,
      database,
      timestamp: new Date().toISOString(),
    };
  }

  @Get('ready')
  @ApiOperation({ summary: 'Readiness probe' })
  ready() {
    return { status: 'ready' };
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe' })
  live() {
    return { status: 'alive' };
  }
}
