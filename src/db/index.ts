import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';

/** Driver-neutral handle; transactions are accepted wherever a `Database` is. */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

let _sql: ReturnType<typeof postgres> | undefined;

export function initDb(connectionString: string): Database {
  _sql = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  return drizzle(_sql, { schema });
}

export async function closeDb(): Promise<void> {
  if (_sql) {
    await _sql.end();
    _sql = undefined;
  }
}

export { schema };
