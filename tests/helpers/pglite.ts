import { PGlite } from '@electric-sql/pglite';
import {
  Kysely,
  PostgresDialect,
  type PostgresCursor,
  type PostgresPool,
  type PostgresPoolClient,
  type PostgresQueryResult,
} from 'kysely';
import { runMigrations } from '../../src/db/migrate.js';
import type { DB } from '../../src/db/types.js';
import { PgLedger } from '../../src/ledger/pgLedger.js';

type Command = PostgresQueryResult<unknown>['command'];

function commandOf(text: string): Command {
  switch (/^\s*(\w+)/.exec(text)?.[1]?.toUpperCase()) {
    case 'INSERT':
      return 'INSERT';
    case 'UPDATE':
      return 'UPDATE';
    case 'DELETE':
      return 'DELETE';
    default:
      return 'SELECT';
  }
}

// Migration files hold several statements and no parameters; those need the simple protocol.
function isScript(text: string, parameters: ReadonlyArray<unknown>): boolean {
  return parameters.length === 0 && text.trim().replace(/;\s*$/, '').includes(';');
}

class PgliteClient implements PostgresPoolClient {
  constructor(private readonly pg: PGlite) {}

  query<R>(sql: string, parameters: ReadonlyArray<unknown>): Promise<PostgresQueryResult<R>>;
  query<R>(cursor: PostgresCursor<R>): PostgresCursor<R>;
  query<R>(
    sqlOrCursor: string | PostgresCursor<R>,
    parameters: ReadonlyArray<unknown> = []
  ): Promise<PostgresQueryResult<R>> | PostgresCursor<R> {
    if (typeof sqlOrCursor !== 'string') throw new Error('pglite_cursor_unsupported');
    return this.run<R>(sqlOrCursor, parameters);
  }

  private async run<R>(text: string, parameters: ReadonlyArray<unknown>): Promise<PostgresQueryResult<R>> {
    if (isScript(text, parameters)) {
      await this.pg.exec(text);
      return { command: 'SELECT', rowCount: 0, rows: [] };
    }
    const res = await this.pg.query<R>(text, [...parameters]);
    return { command: commandOf(text), rowCount: res.affectedRows ?? res.rows.length, rows: res.rows };
  }

  release(): void {}
}

// One PGlite instance is one backend session; every checkout shares it.
class PglitePool implements PostgresPool {
  private readonly client: PgliteClient;

  constructor(private readonly pg: PGlite) {
    this.client = new PgliteClient(pg);
  }

  async connect(): Promise<PostgresPoolClient> {
    return this.client;
  }

  async end(): Promise<void> {
    await this.pg.close();
  }
}

export function createPgliteDb(): Kysely<DB> {
  return new Kysely<DB>({ dialect: new PostgresDialect({ pool: new PglitePool(new PGlite()) }) });
}

// PgLedger over a fresh in-memory Postgres with the project migrations applied.
export async function createPgliteLedger(): Promise<PgLedger> {
  const db = createPgliteDb();
  try {
    await runMigrations(db);
  } catch (err) {
    await db.destroy();
    throw err;
  }
  return new PgLedger(db, () => db.destroy());
}
