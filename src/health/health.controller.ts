import { Controller, Get, Inject, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { sql } from 'drizzle-orm';

import { Public } from '../common/decorators/public.decorator';
import { ApiStandardResponse } from '../common/decorators/swagger-response.decorator';
import { DRIZZLE, type Database } from '../database/database.constants';
import { HealthDto, type HealthStatus } from './health.dto';

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(@Inject(DRIZZLE) private readonly db: Database) {}

  @Public()
  @Get()
  @ApiOperation({ summary: 'Liveness with a database round trip' })
  @ApiStandardResponse(HealthDto)
  async check(): Promise<HealthStatus> {
    try {
      await this.db.execute(sql`select 1`);
    } catch (error) {
      const detail = error instanceof Error ? error.stack : String(error);
      this.logger.error('Database ping failed', detail);
      throw new ServiceUnavailableException('Database unavailable');
    }

    return {
      status: 'ok',
      database: 'up',
      timestamp: new Date().toISOString(),
    };
  }
}
