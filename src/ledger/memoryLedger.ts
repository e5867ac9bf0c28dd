import { nowMs } from '../utils.js';
import type {
  AssignmentKey,
  Deployment,
  NewResult,
  NewSubmission,
  NewTask,
  Result,
  Submission,
  Task,
} from '../types.js';
import {
  LedgerConflictError,
  LedgerReferenceError,
  assignmentLabel,
  sameAssignment,
  type Ledger,
  type NewDeployment,
  type SubmissionFilter,
  type TaskFilter,
} from './ledger.js';

function keyOf(k: AssignmentKey) {
  return `${k.email}\u0000${k.taskId}\u0000${k.round}`;
}

// In-process ledger for tests and LEDGER_BACKEND=memory dry runs. Returns copies so callers
// cannot mutate stored rows.
export class MemoryLedger implements Ledger {
  private tasks = new Map<string, Task>();
  private nonces = new Map<string, string>();
  private submissions = new Map<string, Submission>();
  private results: Result[] = [];
  private deployments = new Map<string, Deployment>();

  async insertTask(input: NewTask): Promise<Task> {
    const k = keyOf(input);
    if (this.tasks.has(k)) throw new LedgerConflictError('duplicate_task', assignmentLabel(input));
    if (this.nonces.has(input.nonce)) throw new LedgerConflictError('duplicate_nonce', input.nonce);
    const task: Task = { ...input, createdAt: input.createdAt ?? nowMs() };
    this.tasks.set(k, task);
    this.nonces.set(task.nonce, k);
    return structuredClone(task);
  }

  async getTask(key: AssignmentKey): Promise<Task | undefined> {
    const t = this.tasks.get(keyOf(key));
    return t ? structuredClone(t) : undefined;
  }

  async getTaskByNonce(nonce: string): Promise<Task | undefined> {
    const k = this.nonces.get(nonce);
    const t = k === undefined ? undefined : this.tasks.get(k);
    return t ? structuredClone(t) : undefined;
  }

  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    return [...this.tasks.values()]
      .filter((t) => (filter.email === undefined || t.email === filter.email) && (filter.round === undefined || t.round === filter.round))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((t) => structuredClone(t));
  }

  async insertSubmission(input: NewSubmission): Promise<Submission> {
    const k = keyOf(input);
    if (this.submissions.has(k)) throw new LedgerConflictError('duplicate_submission', assignmentLabel(input));
    if (!this.nonces.has(input.nonce)) throw new LedgerReferenceError(input.nonce);
    const submission: Submission = { ...input, receivedAt: input.receivedAt ?? nowMs() };
    this.submissions.set(k, submission);
    return { ...submission };
  }

  async getSubmission(key: AssignmentKey): Promise<Submission | undefined> {
    const s = this.submissions.get(keyOf(key));
    return s ? { ...s } : undefined;
  }

  async listSubmissions(filter: SubmissionFilter = {}): Promise<Submission[]> {
    return [...this.submissions.values()]
      .filter((s) => filter.round === undefined || s.round === filter.round)
      .filter((s) => !filter.unevaluated || !this.results.some((r) => sameAssignment(r, s)))
      .sort((a, b) => a.receivedAt - b.receivedAt)
      .map((s) => ({ ...s }));
  }

  async hasResults(key: AssignmentKey): Promise<boolean> {
    return this.results.some((r) => sameAssignment(r, key));
  }

  async listResults(key: AssignmentKey): Promise<Result[]> {
    return this.results.filter((r) => sameAssignment(r, key)).map((r) => ({ ...r }));
  }

  async listAllResults(filter: { round?: number } = {}): Promise<Result[]> {
    return this.results.filter((r) => filter.round === undefined || r.round === filter.round).map((r) => ({ ...r }));
  }

  async insertResults(rows: NewResult[]): Promise<number> {
    const now = nowMs();
    for (const r of rows) this.results.push({ ...r, createdAt: r.createdAt ?? now });
    return rows.length;
  }

  async replaceResults(key: AssignmentKey, rows: NewResult[]): Promise<number> {
    this.results = this.results.filter((r) => !sameAssignment(r, key));
    return this.insertResults(rows);
  }

  async upsertDeployment(input: NewDeployment): Promise<Deployment> {
    const deployment: Deployment = { ...input, files: { ...input.files }, updatedAt: nowMs() };
    this.deployments.set(deployment.taskId, deployment);
    return structuredClone(deployment);
  }

  async getDeployment(taskId: string): Promise<Deployment | undefined> {
    const d = this.deployments.get(taskId);
    return d ? structuredClone(d) : undefined;
  }

  async close(): Promise<void> {}
}
