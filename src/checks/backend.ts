import type { KnownCheck } from './descriptors.js';

export type BackendName = 'playwright' | 'static';

export type PageLoad = { ok: true } | { ok: false; reason: string; logs?: string };

export interface CheckVerdict {
  score: number;
  reason: string;
  logs?: string;
}

export interface CheckOutcome {
  name: string;
  score: number;
  reason: string;
  logs: string;
}

/** One page visit. `close` must be safe to call after a failed `load`. */
export interface BackendSession {
  load(url: string): Promise<PageLoad>;
  run(check: KnownCheck): Promise<CheckVerdict>;
  close(): Promise<void>;
}

export interface CheckBackend {
  readonly name: BackendName;
  launch(): Promise<BackendSession>;
}

export const CLICKABLE_SELECTOR = 'button, [role="button"], input[type="button"], input[type="submit"], input[type="reset"]';

// Case-insensitive substring match against any wanted label.
export function matchesButtonText(label: string, wanted: string[]): boolean {
  const l = label.trim().toLowerCase();
  return l.length > 0 && wanted.some((w) => l.includes(w.toLowerCase()));
}

// Result for checks that need a live page when only the static backend is available.
export function interactionUnsupported(check: KnownCheck): CheckVerdict {
  return { score: 0.5, reason: `${check.type} needs an interactive browser; static backend gives partial credit` };
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}
