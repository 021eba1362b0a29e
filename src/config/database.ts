import { Pool, QueryResult, QueryResultRow } from 'pg';
import type { Logger } from 'pino';
import { PLOT_SCHEMA_STATEMENTS } from '../models/Plot';
import type { AppConfig } from './appConfig';

/**
 * A pooled connection checked out for the duration of one request.
 */
export interface DatabaseClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  release(): void;
}

/**
 * Process-wide handle. Created once at start-up by {@link createDatabase} and
 * passed to whatever needs it; closed once at shutdown.
 */
export interface Database {
  acquire(): Promise<DatabaseClient>;
  close(): Promise<void>;
}

export function createDatabase(config: AppConfig['database'], logger: Logger): Database {
  const pool = new Pool({
    connectionString: config.url,
    max: config.poolMax,
  });

  // Idle clients can error when the server drops them; without a listener this crashes the process.
  pool.on('error', (error) => {
    logger.error({ err: error }, '[database] idle client error');
  });

  return {
    async acquire() {
      const client = await pool.connect();
      return {
        query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
          client.query<R>(text, values),
        release: () => client.release(),
      };
    },
    close: () => pool.end(),
  };
}

export async function withConnection<T>(
  database: Database,
  work: (client: DatabaseClient) => Promise<T>
): Promise<T> {
  const client = await database.acquire();
  try {
    return await work(client);
  } finally {
    client.release();
  }
}

/** Creates the plots table and its index when missing. Existing tables are left untouched. */
export async function ensurePlotSchema(database: Database): Promise<void> {
  await withConnection(database, async (client) => {
    for (const statement of PLOT_SCHEMA_STATEMENTS) {
      await client.query(statement);
    }
  });
}
