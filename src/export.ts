import { stringify } from 'csv-stringify/sync';
import type { Result } from './types.js';

export const RESULT_COLUMNS = [
  'email',
  'task',
  'round',
  'repo_url',
  'commit_sha',
  'pages_url',
  'check',
  'score',
  'reason',
  'created_at',
] as const;

export function resultsToCsv(results: Result[]): string {
  return stringify(
    results.map((r) => [
      r.email,
      r.taskId,
      r.round,
      r.repoUrl,
      r.commitSha,
      r.pagesUrl,
      r.checkName,
      r.score,
      r.reason,
      new Date(r.createdAt).toISOString(),
    ]),
    { header: true, columns: [...RESULT_COLUMNS] }
  );
}

export interface ScoreRow {
  email: string;
  taskId: string;
  round: number;
  checks: number;
  total: number;
}

// Per-assignment totals, in first-seen order.
export function summarizeScores(results: Result[]): ScoreRow[] {
  const rows = new Map<string, ScoreRow>();
  for (const r of results) {
    const key = `${r.email}\u0000${r.taskId}\u0000${r.round}`;
    const row = rows.get(key) ?? { email: r.email, taskId: r.taskId, round: r.round, checks: 0, total: 0 };
    row.checks++;
    row.total += r.score;
    rows.set(key, row);
  }
  return [...rows.values()];
}
