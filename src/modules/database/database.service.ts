import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Pool, type PoolClient, type QueryResultRow } from 'pg';
import * as crypto from 'node:crypto';
import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { AppConfigService } from '../app/app-config.service';

/** The subset of `pg` both the pool and a transaction client answer to. */
export type Queryable = {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<{ rows: R[]; rowCount: number | null }>;
};

/** What `runInTransaction` needs from a checked-out pool client. */
export type TransactionClient = {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
};

/**
 * BEGIN/COMMIT around `fn`. On failure the original error is rethrown even if ROLLBACK
 * fails too, and the client is released with the error so the pool discards it.
 */
export async function runInTransaction<T>(
  client: TransactionClient,
  fn: () => Promise<T>,
  logger: Pick<Logger, 'error'>,
): Promise<T> {
  try {
    await client.query('BEGIN');
    const result = await fn();
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error(`rollback failed: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`);
    }
    client.release(err instanceof Error ? err : true);
    throw err;
  }
}

@Injectable()
export class DatabaseService implements Queryable, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(private readonly appConfig: AppConfigService) {
    this.pool = new Pool({ connectionString: appConfig.databaseUrl() });
    this.pool.on('error', (err) => {
      this.logger.error(`idle client error: ${err.message}`);
    });
  }

  async onModuleInit() {
    const retries = this.appConfig.dbConnectRetries();
    const delayMs = this.appConfig.dbConnectRetryDelayMs();

    let lastError: unknown;
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        await this.ping();
        if (this.appConfig.dbApplySchema()) await this.applySchema();
        return;
      } catch (err) {
        lastError = err;
        // Give Postgres a moment to come up (especially when using docker compose).
        await new Promise((r) => setTimeout(r, delayMs));
      }
    }

    throw new Error(
      `Could not connect to the database after ${retries} attempts. ` +
        `Is Postgres running and is DATABASE_URL correct?\n` +
        `Last error: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
    );
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  async query<R extends QueryResultRow>(text: string, values: unknown[] = []) {
    const startedAt = Date.now();
    const res = await this.pool.query<R>(text, values);
    this.logIfSlow(text, Date.now() - startedAt);
    return { rows: res.rows, rowCount: res.rowCount };
  }

  /** Runs `fn` inside BEGIN/COMMIT on one pooled client; rolls back on any error. */
  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    return await runInTransaction(client, () => fn(this.wrapClient(client)), this.logger);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  private async applySchema() {
    const file = path.resolve(process.cwd(), this.appConfig.dbSchemaPath());
    const sql = await readFile(file, 'utf8');
    await this.pool.query(sql);
    this.logger.log(`applied schema from ${file}`);
  }

  private wrapClient(client: PoolClient): Queryable {
    return {
      query: async <R extends QueryResultRow>(text: string, values: unknown[] = []) => {
        const startedAt = Date.now();
        const res = await client.query<R>(text, values);
        this.logIfSlow(text, Date.now() - startedAt);
        return { rows: res.rows, rowCount: res.rowCount };
      },
    };
  }

  private logIfSlow(text: string, ms: number) {
    if (!this.appConfig.dbLogSlowQueries() || ms < this.appConfig.dbSlowQueryMs()) return;
    // Do NOT log query params to avoid leaking PII. Use a short fingerprint for grouping.
    const kind = text.trim().split(/\s+/, 1)[0]?.toUpperCase() || 'QUERY';
    const fp = crypto.createHash('sha1').update(text).digest('hex').slice(0, 10);
    this.logger.warn(`[db] slow ${Math.floor(ms)}ms kind=${kind} query=${fp}`);
  }
}
