import { postJson, type FetchLike } from '../http.js';
import { envNumber, sleep as realSleep, truncate, type Sleep } from '../utils.js';

export interface NotifyInput {
  evaluationUrl: string;
  email: string;
  taskId: string;
  round: number;
  nonce: string;
  repoUrl: string;
  commitSha: string;
  pagesUrl: string;
}

export interface NotifyOptions {
  timeoutMs?: number;
  // Retries after the first attempt.
  maxRetries?: number;
  baseDelayMs?: number;
  sleep?: Sleep;
  fetchImpl?: FetchLike;
}

export interface NotifyResult {
  success: boolean;
  attempts: number;
  statusCode?: number;
  error?: string;
  totalDelayMs: number;
}

export function notifyDefaults() {
  return {
    timeoutMs: envNumber('NOTIFY_TIMEOUT_MS', 30_000),
    maxRetries: envNumber('NOTIFY_MAX_RETRIES', 7),
    baseDelayMs: envNumber('NOTIFY_BASE_DELAY_MS', 1000),
  };
}

export function notificationPayload(input: NotifyInput) {
  return {
    email: input.email,
    task: input.taskId,
    round: input.round,
    nonce: input.nonce,
    repo_url: input.repoUrl,
    commit_sha: input.commitSha,
    pages_url: input.pagesUrl,
  };
}

/**
 * Report a deployed submission to the grading collector. 1 + maxRetries attempts with
 * doubling delays (1s, 2s, 4s, ...). Only HTTP 200 counts as delivered. Never throws.
 */
export async function notifyEvaluation(input: NotifyInput, opts: NotifyOptions = {}): Promise<NotifyResult> {
  const defaults = notifyDefaults();
  const timeoutMs = opts.timeoutMs ?? defaults.timeoutMs;
  const maxRetries = Math.max(0, opts.maxRetries ?? defaults.maxRetries);
  const baseDelayMs = opts.baseDelayMs ?? defaults.baseDelayMs;
  const sleep = opts.sleep ?? realSleep;
  const payload = notificationPayload(input);
  const maxAttempts = maxRetries + 1;

  let totalDelayMs = 0;
  let statusCode: number | undefined;
  let error: string | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const out = await postJson(input.evaluationUrl, payload, { timeoutMs, fetchImpl: opts.fetchImpl });
    if (out.kind === 'response') {
      statusCode = out.status;
      if (out.status === 200) {
        console.log(`[notify] email=${input.email} task=${input.taskId} round=${input.round} delivered attempt=${attempt}`);
        return { success: true, attempts: attempt, statusCode: 200, totalDelayMs };
      }
      error = `HTTP ${out.status}: ${truncate(out.text, 200)}`;
    } else if (out.kind === 'timeout') {
      statusCode = undefined;
      error = `Timeout after ${out.timeoutMs / 1000}s`;
    } else {
      statusCode = undefined;
      error = `Request error: ${out.message}`;
    }
    console.error(`[notify] email=${input.email} task=${input.taskId} attempt=${attempt}/${maxAttempts} failed: ${error}`);

    if (attempt < maxAttempts) {
      const delay = baseDelayMs * 2 ** (attempt - 1);
      totalDelayMs += delay;
      await sleep(delay);
    }
  }

  return {
    success: false,
    attempts: maxAttempts,
    ...(statusCode !== undefined ? { statusCode } : {}),
    ...(error !== undefined ? { error } : {}),
    totalDelayMs,
  };
}
