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

export type ConflictCode = 'duplicate_task' | 'duplicate_nonce' | 'duplicate_submission';

export class LedgerConflictError extends Error {
  readonly code: ConflictCode;

  constructor(code: ConflictCode, detail: string) {
    super(`${code}:${detail}`);
    this.name = 'LedgerConflictError';
    this.code = code;
  }
}

// A submission must point at a stored task through its nonce.
export class LedgerReferenceError extends Error {
  readonly code = 'unknown_nonce';

  constructor(nonce: string) {
    super(`unknown_nonce:${nonce}`);
    this.name = 'LedgerReferenceError';
  }
}

export interface TaskFilter {
  email?: string;
  round?: number;
}

export interface SubmissionFilter {
  round?: number;
  // Only submissions with no result rows yet.
  unevaluated?: boolean;
}

export type NewDeployment = Omit<Deployment, 'updatedAt'>;

/**
 * Durable record of tasks, submissions, results and deployments.
 *
 * Tasks and submissions are write-once; inserting a second row for the same
 * (email, taskId, round) or reusing a nonce raises LedgerConflictError. A submission whose
 * nonce matches no task raises LedgerReferenceError.
 */
export interface Ledger {
  insertTask(task: NewTask): Promise<Task>;
  getTask(key: AssignmentKey): Promise<Task | undefined>;
  getTaskByNonce(nonce: string): Promise<Task | undefined>;
  listTasks(filter?: TaskFilter): Promise<Task[]>;

  insertSubmission(submission: NewSubmission): Promise<Submission>;
  getSubmission(key: AssignmentKey): Promise<Submission | undefined>;
  listSubmissions(filter?: SubmissionFilter): Promise<Submission[]>;

  hasResults(key: AssignmentKey): Promise<boolean>;
  listResults(key: AssignmentKey): Promise<Result[]>;
  listAllResults(filter?: { round?: number }): Promise<Result[]>;
  /** Bulk insert; all rows land or none do. */
  insertResults(results: NewResult[]): Promise<number>;
  /** Drop existing rows for the assignment and write the new set atomically. */
  replaceResults(key: AssignmentKey, results: NewResult[]): Promise<number>;

  upsertDeployment(deployment: NewDeployment): Promise<Deployment>;
  getDeployment(taskId: string): Promise<Deployment | undefined>;

  close(): Promise<void>;
}

export function sameAssignment(a: AssignmentKey, b: AssignmentKey): boolean {
  return a.email === b.email && a.taskId === b.taskId && a.round === b.round;
}

export function assignmentLabel(key: AssignmentKey): string {
  return `${key.email}/${key.taskId}/r${key.round}`;
}
