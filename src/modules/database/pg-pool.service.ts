import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';

export const FALLBACK_DATABASE_URL = 'postgres://localhost:5432/autogroup';

/**
 * Owns the node-postgres connection pool. Connections are opened lazily on the
 * first query; the pool is drained when the Nest application shuts down.
 */
@Injectable()
export class PgPoolService implements OnModuleDestroy {
  private readonly logger = new Logger(PgPoolService.name);
  private readonly pool: Pool;

  constructor(config: ConfigService) {
    const configured = config.get<string>('DATABASE_URL');
    const connectionString = configured && configured.trim().length > 0 ? configured : FALLBACK_DATABASE_URL;

    if (connectionString === FALLBACK_DATABASE_URL) {
      this.logger.warn(`DATABASE_URL not set – using fallback '${FALLBACK_DATABASE_URL}'.`);
    }

    this.pool = new Pool({ connectionString });
  }

  query<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, params);
  }

  /**
   * Run `fn` inside BEGIN/COMMIT on a dedicated client. On failure the
   * transaction is rolled back and the original error rethrown; the client is
   * released with that error so the pool destroys it instead of reusing it.
   */
  async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let result: T;
    try {
      await client.query('BEGIN');
      result = await fn(client);
      await client.query('COMMIT');
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        this.logger.error(`ROLLBACK failed: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`);
      }
      client.release(err instanceof Error ? err : new Error(String(err)));
      throw err;
    }
    client.release();
    return result;
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }
}
