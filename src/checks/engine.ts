import { errorMessage, truncate } from '../utils.js';
import { clampScore, type BackendName, type BackendSession, type CheckBackend, type CheckOutcome } from './backend.js';
import { checkName, type Check } from './descriptors.js';
import { PlaywrightBackend } from './playwrightBackend.js';
import { StaticBackend } from './staticBackend.js';

export const LOG_EXCERPT_CHARS = 500;

export interface RunChecksInput {
  url: string;
  checks: Check[];
  // Omitted: go straight to the fallback.
  interactive?: CheckBackend;
  fallback: CheckBackend;
}

export interface RunChecksOutput {
  backend: BackendName;
  outcomes: CheckOutcome[];
}

async function openSession(input: RunChecksInput): Promise<{ backend: CheckBackend; session: BackendSession }> {
  if (input.interactive) {
    try {
      return { backend: input.interactive, session: await input.interactive.launch() };
    } catch (err) {
      console.warn(`[checks] ${input.interactive.name} backend unavailable, using ${input.fallback.name}: ${errorMessage(err)}`);
    }
  }
  return { backend: input.fallback, session: await input.fallback.launch() };
}

function outcome(name: string, score: number, reason: string, logs = ''): CheckOutcome {
  return { name, score: clampScore(score), reason, logs: truncate(logs, LOG_EXCERPT_CHARS) };
}

/**
 * Visit `url` once and score every known check in order. A page that does not load yields a
 * single `page_load` outcome; a check that throws scores 0 without stopping the others.
 */
export async function runChecks(input: RunChecksInput): Promise<RunChecksOutput> {
  const { backend, session } = await openSession(input);
  try {
    const loaded = await session.load(input.url);
    if (!loaded.ok) {
      return { backend: backend.name, outcomes: [outcome('page_load', 0, loaded.reason, loaded.logs)] };
    }

    const outcomes: CheckOutcome[] = [];
    for (const check of input.checks) {
      if (check.type === 'unknown') {
        console.warn(`[checks] skip type=${check.originalType} problem=${check.problem}`);
        continue;
      }
      const name = checkName(check);
      try {
        const verdict = await session.run(check);
        outcomes.push(outcome(name, verdict.score, verdict.reason, verdict.logs));
      } catch (err) {
        outcomes.push(outcome(name, 0, `Error: ${errorMessage(err)}`));
      }
    }
    return { backend: backend.name, outcomes };
  } finally {
    await session.close();
  }
}

export type PageChecker = (url: string, checks: Check[]) => Promise<RunChecksOutput>;

// CHECK_BACKEND=static skips the browser entirely.
export function createPageChecker(
  opts: { mode?: string; interactive?: CheckBackend; fallback?: CheckBackend } = {}
): PageChecker {
  const mode = opts.mode ?? process.env.CHECK_BACKEND ?? 'auto';
  const fallback = opts.fallback ?? new StaticBackend();
  const interactive = mode === 'static' ? undefined : (opts.interactive ?? new PlaywrightBackend());
  return (url, checks) => runChecks({ url, checks, interactive, fallback });
}
