import { nanoid } from 'nanoid';
import type { Ledger } from '../ledger/ledger.js';
import { postJson, type FetchLike } from '../http.js';
import { findTemplate, type Catalog } from '../tasks/catalog.js';
import { generateTask, templateIdFromTaskId } from '../tasks/generator.js';
import type { Participant } from '../schemas.js';
import type { Attachment, BatchSummary, NewTask, Submission } from '../types.js';
import { envList, envNumber, errorMessage, hourBucket, sleep as realSleep, truncate, type Sleep } from '../utils.js';

export interface DispatchPayload {
  email: string;
  task: string;
  round: number;
  nonce: string;
  brief: string;
  attachments: Attachment[];
  checks: unknown[];
  evaluation_url: string;
  secret: string;
}

export interface DispatchOptions {
  timeoutMs?: number;
  retryDelaysSec?: number[];
  maxAttempts?: number;
  sleep?: Sleep;
  fetchImpl?: FetchLike;
}

export interface DispatchOutcome {
  // Last HTTP status seen; 0 when the last attempt never got a response.
  status: number;
  error: string | null;
  attempts: number;
}

type DispatchTarget = Pick<
  NewTask,
  'email' | 'taskId' | 'round' | 'nonce' | 'brief' | 'attachments' | 'checks' | 'evaluationUrl' | 'secret' | 'endpoint'
>;

export const DEFAULT_CRITICAL_CHECKS = ['mit_license', 'page_load'];

export function dispatchDefaults() {
  return {
    timeoutMs: envNumber('DISPATCH_TIMEOUT_MS', 300_000),
    retryDelaysSec: envList('DISPATCH_RETRY_DELAYS_SEC', ['60', '180', '600']).map(Number).filter((n) => Number.isFinite(n) && n >= 0),
    maxAttempts: 3,
    interDelayMs: envNumber('DISPATCH_INTER_DELAY_MS', 1000),
  };
}

export function buildDispatchPayload(task: DispatchTarget): DispatchPayload {
  return {
    email: task.email,
    task: task.taskId,
    round: task.round,
    nonce: task.nonce,
    brief: task.brief,
    attachments: task.attachments,
    checks: task.checks,
    evaluation_url: task.evaluationUrl,
    secret: task.secret,
  };
}

export async function dispatchTask(task: DispatchTarget, opts: DispatchOptions = {}): Promise<DispatchOutcome> {
  const defaults = dispatchDefaults();
  const timeoutMs = opts.timeoutMs ?? defaults.timeoutMs;
  const delays = opts.retryDelaysSec ?? defaults.retryDelaysSec;
  const maxAttempts = Math.max(1, opts.maxAttempts ?? defaults.maxAttempts);
  const sleep = opts.sleep ?? realSleep;
  const payload = buildDispatchPayload(task);

  let status = 0;
  let error: string | null = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const out = await postJson(task.endpoint, payload, { timeoutMs, fetchImpl: opts.fetchImpl });
    if (out.kind === 'response') {
      status = out.status;
      if (out.status === 200) {
        console.log(`[dispatch] email=${task.email} task=${task.taskId} round=${task.round} attempt=${attempt} status=200`);
        return { status: 200, error: null, attempts: attempt };
      }
      error = `HTTP ${out.status}: ${truncate(out.text, 200)}`;
    } else if (out.kind === 'timeout') {
      status = 0;
      error = `Timeout after ${out.timeoutMs / 1000}s`;
    } else {
      status = 0;
      error = `Request error: ${out.message}`;
    }
    console.error(`[dispatch] email=${task.email} task=${task.taskId} attempt=${attempt}/${maxAttempts} failed: ${error}`);

    if (attempt < maxAttempts) {
      const delaySec = delays[Math.min(attempt - 1, delays.length - 1)] ?? 0;
      await sleep(delaySec * 1000);
    }
  }
  return { status, error, attempts: maxAttempts };
}

interface RoundRunOptions {
  ledger: Ledger;
  catalog: Catalog;
  evaluationUrl: string;
  // Defaults to the current UTC hour.
  hourBucket?: string;
  dispatch?: DispatchOptions;
  interDelayMs?: number;
  sleep?: Sleep;
  newNonce?: () => string;
}

export interface Round1Options extends RoundRunOptions {
  participants: Participant[];
}

async function dispatchAndRecord(
  ledger: Ledger,
  task: NewTask,
  opts: DispatchOptions
): Promise<{ delivered: boolean }> {
  const outcome = await dispatchTask(task, opts);
  await ledger.insertTask({ ...task, dispatchStatus: outcome.status, dispatchError: outcome.error });
  return { delivered: outcome.status === 200 };
}

export async function runRound1(opts: Round1Options): Promise<BatchSummary> {
  const bucket = opts.hourBucket ?? hourBucket();
  const sleep = opts.sleep ?? opts.dispatch?.sleep ?? realSleep;
  const interDelayMs = opts.interDelayMs ?? dispatchDefaults().interDelayMs;
  const newNonce = opts.newNonce ?? (() => nanoid());
  const summary: BatchSummary = { processed: 0, skipped: 0, failed: 0, total: opts.participants.length };

  for (const p of opts.participants) {
    try {
      const gen = generateTask({ catalog: opts.catalog, round: 1, email: p.email, hourBucket: bucket });
      if (await opts.ledger.getTask({ email: p.email, taskId: gen.taskId, round: 1 })) {
        console.log(`[round1] skip email=${p.email} task=${gen.taskId} reason=already_dispatched`);
        summary.skipped++;
        continue;
      }
      const task: NewTask = {
        email: p.email,
        taskId: gen.taskId,
        round: 1,
        nonce: newNonce(),
        templateId: gen.templateId,
        brief: gen.brief,
        checks: gen.checks,
        attachments: gen.attachments,
        evaluationUrl: opts.evaluationUrl,
        endpoint: p.endpoint,
        secret: p.secret,
        dispatchStatus: null,
        dispatchError: null,
      };
      const { delivered } = await dispatchAndRecord(opts.ledger, task, { ...opts.dispatch, sleep });
      if (delivered) summary.processed++;
      else summary.failed++;
    } catch (err) {
      console.error(`[round1] email=${p.email} failed: ${errorMessage(err)}`);
      summary.failed++;
    }
    if (interDelayMs > 0) await sleep(interDelayMs);
  }

  console.log(`[round1] processed=${summary.processed} skipped=${summary.skipped} failed=${summary.failed} total=${summary.total}`);
  return summary;
}

export interface Eligibility {
  eligible: boolean;
  reason?: string;
  warning?: string;
}

export async function isEligibleForNextRound(
  ledger: Ledger,
  submission: Submission,
  opts: { criticalChecks: string[]; nextRound?: number }
): Promise<Eligibility> {
  const nextRound = opts.nextRound ?? submission.round + 1;
  const lineage = templateIdFromTaskId(submission.taskId);
  const sameLineage = (taskId: string) => templateIdFromTaskId(taskId) === lineage;

  const nextTasks = await ledger.listTasks({ email: submission.email, round: nextRound });
  if (nextTasks.some((t) => sameLineage(t.taskId))) return { eligible: false, reason: 'next_round_task_exists' };

  const nextSubs = await ledger.listSubmissions({ round: nextRound });
  if (nextSubs.some((s) => s.email === submission.email && sameLineage(s.taskId))) {
    return { eligible: false, reason: 'next_round_submission_exists' };
  }

  const results = await ledger.listResults(submission);
  if (!results.length) return { eligible: true, warning: 'no_results' };

  const critical = new Set(opts.criticalChecks);
  const failedCritical = results.filter((r) => critical.has(r.checkName) && r.score === 0).map((r) => r.checkName);
  if (failedCritical.length) return { eligible: false, reason: `critical_check_failed:${failedCritical.join(',')}` };
  return { eligible: true };
}

export interface NextRoundOptions extends RoundRunOptions {
  criticalChecks?: string[];
  round?: number;
}

export async function runRound2(opts: NextRoundOptions): Promise<BatchSummary> {
  const round = opts.round ?? 2;
  const bucket = opts.hourBucket ?? hourBucket();
  const sleep = opts.sleep ?? opts.dispatch?.sleep ?? realSleep;
  const interDelayMs = opts.interDelayMs ?? dispatchDefaults().interDelayMs;
  const newNonce = opts.newNonce ?? (() => nanoid());
  const defaultCritical = opts.criticalChecks ?? envList('CRITICAL_CHECKS', DEFAULT_CRITICAL_CHECKS);

  const submissions = await opts.ledger.listSubmissions({ round: round - 1 });
  const summary: BatchSummary = { processed: 0, skipped: 0, failed: 0, total: submissions.length };

  for (const sub of submissions) {
    try {
      const template = findTemplate(opts.catalog, templateIdFromTaskId(sub.taskId));
      const criticalChecks = template?.critical_checks ?? defaultCritical;
      const verdict = await isEligibleForNextRound(opts.ledger, sub, { criticalChecks, nextRound: round });
      if (!verdict.eligible) {
        console.log(`[round${round}] skip email=${sub.email} task=${sub.taskId} reason=${verdict.reason ?? 'ineligible'}`);
        summary.skipped++;
        continue;
      }
      if (verdict.warning) console.warn(`[round${round}] email=${sub.email} task=${sub.taskId} warning=${verdict.warning}`);

      const previous = await opts.ledger.getTask(sub);
      if (!previous) throw new Error(`previous_task_missing:${sub.taskId}`);

      const gen = generateTask({
        catalog: opts.catalog,
        round,
        email: sub.email,
        hourBucket: bucket,
        previousTaskId: sub.taskId,
      });
      const task: NewTask = {
        email: sub.email,
        taskId: gen.taskId,
        round,
        nonce: newNonce(),
        templateId: gen.templateId,
        brief: gen.brief,
        checks: gen.checks,
        attachments: gen.attachments,
        evaluationUrl: opts.evaluationUrl,
        endpoint: previous.endpoint,
        secret: previous.secret,
        dispatchStatus: null,
        dispatchError: null,
      };
      const { delivered } = await dispatchAndRecord(opts.ledger, task, { ...opts.dispatch, sleep });
      if (delivered) summary.processed++;
      else summary.failed++;
    } catch (err) {
      console.error(`[round${round}] email=${sub.email} task=${sub.taskId} failed: ${errorMessage(err)}`);
      summary.failed++;
    }
    if (interDelayMs > 0) await sleep(interDelayMs);
  }

  console.log(
    `[round${round}] processed=${summary.processed} skipped=${summary.skipped} failed=${summary.failed} total=${summary.total}`
  );
  return summary;
}
