import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { sql } from 'drizzle-orm';
import { Pool } from 'pg';

import { Database, DRIZZLE, PG_POOL } from './database.constants';
import { SCHEMA_STATEMENTS } from './ddl';

@Injectable()
export class DatabaseSetupService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseSetupService.name);

  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    @Inject(PG_POOL) private readonly pool: Pool,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    if (this.configService.getOrThrow<boolean>('SKIP_DATABASE_SETUP')) {
      this.logger.log('Skipping database setup');
      return;
    }
    await this.ensureSchema();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Creates missing tables and indexes. Existing objects are left untouched, so
   * column changes on a live database still need a manual migration.
   */
  private async ensureSchema(): Promise<void> {
    this.logger.log('Ensuring database tables exist...');

    for (const statement of SCHEMA_STATEMENTS) {
      await this.db.execute(sql.raw(statement));
    }

    this.logger.log(`Database schema check completed (${SCHEMA_STATEMENTS.length} statements).`);
  }
}
