// Load .env only in non-test environments
const _loadEnv =
  process.env.NODE_ENV !== 'test' && !process.env.VITEST ? import('dotenv/config').catch(() => {}) : Promise.resolve();
await _loadEnv;
import { writeFile } from 'fs/promises';
import { resultsToCsv, summarizeScores } from '../src/export.js';
import { openLedger } from '../src/ledger/index.js';
import { argValue, intArg } from './cli.js';

// Usage: export-results [--round N] [--out results.csv]
const round = intArg('--round');
const out = argValue('--out');

const ledger = await openLedger();
try {
  const results = await ledger.listAllResults(round === undefined ? {} : { round });
  const csv = resultsToCsv(results);
  if (out) {
    await writeFile(out, csv, 'utf8');
    console.log(`[export] rows=${results.length} file=${out}`);
  } else {
    process.stdout.write(csv);
  }
  for (const row of summarizeScores(results)) {
    console.error(`[export] ${row.email} ${row.taskId} r${row.round} ${row.total.toFixed(2)}/${row.checks}`);
  }
} catch (err) {
  console.error('[export] failed', err);
  process.exitCode = 1;
} finally {
  await ledger.close();
}
