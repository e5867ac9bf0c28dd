import path from 'path';
import { readdir, readFile } from 'fs/promises';
import { sql, type Kysely } from 'kysely';
import { createDb } from './client.js';
import type { DB } from './types.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'db/migrations');

async function listMigrationFiles(dir: string): Promise<string[]> {
  return (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
}

/**
 * Apply every `*.sql` file in `migrationsDir` that is not yet recorded in `schema_migrations`.
 *
 * Each file runs in its own transaction, after its filename has been claimed there. A second
 * process starting at the same time blocks on the primary key, then finds nothing to claim.
 */
export async function runMigrations(db: Kysely<DB>, migrationsDir = DEFAULT_MIGRATIONS_DIR): Promise<MigrationResult> {
  await sql`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `.execute(db);

  const recorded = await db.selectFrom('schema_migrations').select('filename').execute();
  const done = new Set(recorded.map((r) => r.filename));
  const result: MigrationResult = { applied: [], skipped: [] };

  for (const file of await listMigrationFiles(migrationsDir)) {
    if (done.has(file)) {
      result.skipped.push(file);
      continue;
    }
    const text = await readFile(path.join(migrationsDir, file), 'utf8');
    const ran = await db.transaction().execute(async (trx) => {
      const claimed = await trx
        .insertInto('schema_migrations')
        .values({ filename: file })
        .onConflict((oc) => oc.column('filename').doNothing())
        .returning('filename')
        .executeTakeFirst();
      if (!claimed) return false;
      await sql.raw(text).execute(trx);
      return true;
    });
    (ran ? result.applied : result.skipped).push(file);
  }
  return result;
}

if (process.env.NODE_ENV !== 'test' && import.meta.url === `file://${process.argv[1]}`) {
  await (process.env.VITEST ? Promise.resolve() : import('dotenv/config').catch(() => {}));
  const handle = createDb();
  try {
    const res = await runMigrations(handle.db);
    console.log(`[migrate] applied=${res.applied.length} skipped=${res.skipped.length}`);
    if (res.applied.length) console.log(res.applied.join('\n'));
  } catch (err) {
    console.error('[migrate] failed', err);
    process.exitCode = 1;
  } finally {
    await handle.close();
  }
}
