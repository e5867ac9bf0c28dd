// Load .env only in non-test environments
const _loadEnv =
  process.env.NODE_ENV !== 'test' && !process.env.VITEST ? import('dotenv/config').catch(() => {}) : Promise.resolve();
await _loadEnv;
import { createPageChecker } from '../src/checks/engine.js';
import { runEvaluation } from '../src/evaluation/evaluator.js';
import { createRepoChecker } from '../src/evaluation/repoChecks.js';
import { openLedger } from '../src/ledger/index.js';
import { envFlag } from '../src/utils.js';
import { hasFlag, intArg } from './cli.js';

// Usage: evaluation-runner [--round N] [--force]
const round = intArg('--round');
const force = hasFlag('--force');

const ledger = await openLedger();
try {
  const summary = await runEvaluation({
    ledger,
    pageChecks: createPageChecker(),
    repoChecks: envFlag('REPO_CHECKS', true) ? createRepoChecker() : undefined,
    round,
    force,
  });
  if (summary.failed > 0) process.exitCode = 1;
} catch (err) {
  console.error('[evaluate] aborted', err);
  process.exitCode = 1;
} finally {
  await ledger.close();
}
