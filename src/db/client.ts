import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import type { DB } from './types.js';

const { Pool } = pg;

function wantDbSsl(): boolean {
  const v = String(process.env.DB_SSL ?? '').trim().toLowerCase();
  return v === 'true' || v === '1' || v === 'require';
}

export interface DbHandle {
  db: Kysely<DB>;
  close(): Promise<void>;
}

export function databaseUrl(): string {
  return process.env.DATABASE_URL ?? 'postgresql://localhost:5432/pagegrade';
}

export function createDb(connectionString: string = databaseUrl()): DbHandle {
  const pool = new Pool({
    connectionString,
    ...(wantDbSsl() ? { ssl: { rejectUnauthorized: false } } : {}),
  });
  const db = new Kysely<DB>({ dialect: new PostgresDialect({ pool }) });
  return {
    db,
    // Kysely's destroy() ends the pool it was given.
    close: () => db.destroy(),
  };
}
