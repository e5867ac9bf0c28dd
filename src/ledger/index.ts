import type { Ledger } from './ledger.js';
import { MemoryLedger } from './memoryLedger.js';
import { createPgLedger } from './pgLedger.js';

export * from './ledger.js';
export { MemoryLedger } from './memoryLedger.js';
export { PgLedger, createPgLedger } from './pgLedger.js';

// LEDGER_BACKEND=memory keeps everything in process (dry runs); anything else is Postgres.
export async function openLedger(backend = process.env.LEDGER_BACKEND ?? 'pg'): Promise<Ledger> {
  if (backend === 'memory') {
    console.warn('[ledger] using in-memory backend; nothing will be persisted');
    return new MemoryLedger();
  }
  return createPgLedger();
}
