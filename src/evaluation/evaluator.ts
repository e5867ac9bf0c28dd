import type { CheckOutcome } from '../checks/backend.js';
import { parseChecks } from '../checks/descriptors.js';
import type { PageChecker } from '../checks/engine.js';
import { assignmentLabel, type Ledger } from '../ledger/ledger.js';
import type { NewResult, Submission } from '../types.js';
import { errorMessage } from '../utils.js';
import type { RepoChecker } from './repoChecks.js';

export interface EvaluationSummary {
  evaluated: number;
  skipped: number;
  failed: number;
  total: number;
}

export interface RunEvaluationOptions {
  ledger: Ledger;
  pageChecks: PageChecker;
  repoChecks?: RepoChecker;
  round?: number;
  // Re-run assignments that already have results, replacing them.
  force?: boolean;
}

function toResults(sub: Submission, outcomes: CheckOutcome[]): NewResult[] {
  return outcomes.map((o) => ({
    email: sub.email,
    taskId: sub.taskId,
    round: sub.round,
    repoUrl: sub.repoUrl,
    commitSha: sub.commitSha,
    pagesUrl: sub.pagesUrl,
    checkName: o.name,
    score: o.score,
    reason: o.reason,
    logs: o.logs,
  }));
}

async function candidates(opts: RunEvaluationOptions): Promise<Submission[]> {
  if (opts.round === undefined) return opts.ledger.listSubmissions();
  return opts.ledger.listSubmissions({ round: opts.round, unevaluated: !opts.force });
}

export async function evaluateSubmission(opts: RunEvaluationOptions, sub: Submission): Promise<'evaluated' | 'skipped'> {
  const { ledger } = opts;
  if (!opts.force && (await ledger.hasResults(sub))) return 'skipped';

  const task = await ledger.getTaskByNonce(sub.nonce);
  if (!task) throw new Error(`task_not_found:${sub.nonce}`);

  const repoOutcomes = opts.repoChecks ? await opts.repoChecks(sub) : [];
  const page = await opts.pageChecks(sub.pagesUrl, parseChecks(task.checks));
  const rows = toResults(sub, [...repoOutcomes, ...page.outcomes]);

  if (opts.force) await ledger.replaceResults(sub, rows);
  else await ledger.insertResults(rows);

  const total = rows.reduce((acc, r) => acc + r.score, 0);
  console.log(
    `[evaluate] ${assignmentLabel(sub)} backend=${page.backend} checks=${rows.length} score=${total.toFixed(2)}/${rows.length}`
  );
  return 'evaluated';
}

export async function runEvaluation(opts: RunEvaluationOptions): Promise<EvaluationSummary> {
  const subs = await candidates(opts);
  const summary: EvaluationSummary = { evaluated: 0, skipped: 0, failed: 0, total: subs.length };

  for (const sub of subs) {
    try {
      const status = await evaluateSubmission(opts, sub);
      summary[status]++;
    } catch (err) {
      console.error(`[evaluate] ${assignmentLabel(sub)} failed: ${errorMessage(err)}`);
      summary.failed++;
    }
  }

  console.log(
    `[evaluate] evaluated=${summary.evaluated} skipped=${summary.skipped} failed=${summary.failed} total=${summary.total}`
  );
  return summary;
}
