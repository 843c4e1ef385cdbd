import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { sql } from 'drizzle-orm';
import type { Database } from './index.js';
import { schemaMigrations } from './schema/migrations.js';
import { logger } from '../lib/logger.js';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations', import.meta.url));

const STATEMENT_BREAKPOINT = '--> statement-breakpoint';

/** Applies every `*.sql` file not yet recorded in `schema_migrations`, in file-name order. */
export async function runMigrations(db: Database, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await db.execute(sql.raw(
    'CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW())',
  ));

  const appliedRows = await db.select({ name: schemaMigrations.name }).from(schemaMigrations);
  const applied = new Set(appliedRows.map(r => r.name));

  const files = (await readdir(dir)).filter(f => f.endsWith('.sql')).sort();
  const newlyApplied: string[] = [];

  for (const file of files) {
    if (applied.has(file)) continue;

    const content = await readFile(join(dir, file), 'utf-8');
    const statements = content
      .split(STATEMENT_BREAKPOINT)
      .map(s => s.trim())
      .filter(s => s.length > 0);

    await db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(schemaMigrations).values({ name: file });
    });

    logger.info({ file, statements: statements.length }, 'Migration applied');
    newlyApplied.push(file);
  }

  return newlyApplied;
}

async function main() {
  const { config } = await import('../config/index.js');
  const { initDb, closeDb } = await import('./index.js');
  const db = initDb(config.databaseUrl);
  try {
    const applied = await runMigrations(db);
    logger.info({ applied }, 'Migrations complete');
  } finally {
    await closeDb();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    logger.fatal({ error }, 'Migration failed');
    process.exit(1);
  });
}
