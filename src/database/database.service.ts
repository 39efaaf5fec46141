import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import { maskCredentials } from '../common/utils/mask-credentials';

/**
 * Owns the relational store connection pool.
 * Connections are opened lazily by the pool on the first query.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(private readonly configService: ConfigService) {
    const connectionString = this.configService.get<string>('DATABASE_URL', '');
    const probeTimeout = this.configService.get<number>('PROBE_TIMEOUT_MS', 2000);

    this.pool = new Pool({
      connectionString,
      max: this.configService.get<number>('DB_POOL_MAX', 10),
      connectionTimeoutMillis: this.configService.get<number>('DB_CONNECT_TIMEOUT_MS', 5000),
      statement_timeout: probeTimeout,
      query_timeout: probeTimeout,
    });

    // An idle client dropping its connection must not crash the process
    this.pool.on('error', (err) => {
      this.logger.error(`Database pool error: ${err.message}`);
    });

    this.logger.log(`Database pool initialized: ${maskCredentials(connectionString)}`);
  }

  query<R extends QueryResultRow = QueryResultRow>(text: string): Promise<QueryResult<R>> {
    return this.pool.query<R>(text);
  }

  async onModuleDestroy(): Promise<void> {
    try {
      await this.pool.end();
      this.logger.log('Database pool closed');
    } catch (error) {
      this.logger.warn(
        `Error closing database pool: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
