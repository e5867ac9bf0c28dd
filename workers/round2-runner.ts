// Load .env only in non-test environments
const _loadEnv =
  process.env.NODE_ENV !== 'test' && !process.env.VITEST ? import('dotenv/config').catch(() => {}) : Promise.resolve();
await _loadEnv;
import { runRound2 } from '../src/dispatch/dispatcher.js';
import { openLedger } from '../src/ledger/index.js';
import { loadCatalog } from '../src/tasks/catalog.js';
import { intArg, mustEnv } from './cli.js';

// Usage: round2-runner [--round 2]
const round = intArg('--round') ?? 2;
if (round < 2) throw new Error(`invalid_round:${round}`);

const ledger = await openLedger();
try {
  const catalog = await loadCatalog();
  const summary = await runRound2({ ledger, catalog, round, evaluationUrl: mustEnv('EVALUATION_URL') });
  if (summary.failed > 0) process.exitCode = 1;
} catch (err) {
  console.error(`[round${round}] aborted`, err);
  process.exitCode = 1;
} finally {
  await ledger.close();
}
