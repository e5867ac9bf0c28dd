// Load .env only in non-test environments
const _loadEnv =
  process.env.NODE_ENV !== 'test' && !process.env.VITEST ? import('dotenv/config').catch(() => {}) : Promise.resolve();
await _loadEnv;
import { readParticipants } from '../src/dispatch/participants.js';
import { runRound1 } from '../src/dispatch/dispatcher.js';
import { openLedger } from '../src/ledger/index.js';
import { loadCatalog } from '../src/tasks/catalog.js';
import { argValue, mustEnv } from './cli.js';

// Usage: round1-runner [--participants participants.csv]
const csvPath = argValue('--participants') ?? process.env.PARTICIPANTS_CSV ?? 'participants.csv';

const ledger = await openLedger();
try {
  const catalog = await loadCatalog();
  const participants = await readParticipants(csvPath);
  console.log(`[round1] participants=${participants.length} source=${csvPath}`);
  const summary = await runRound1({ ledger, catalog, participants, evaluationUrl: mustEnv('EVALUATION_URL') });
  if (summary.failed > 0) process.exitCode = 1;
} catch (err) {
  console.error('[round1] aborted', err);
  process.exitCode = 1;
} finally {
  await ledger.close();
}
