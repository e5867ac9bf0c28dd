import type { Kysely, Selectable, Transaction } from 'kysely';
import { createDb, type DbHandle } from '../db/client.js';
import { runMigrations } from '../db/migrate.js';
import type { DB, DeploymentsTable, ResultsTable, SubmissionsTable, TasksTable } from '../db/types.js';
import { attachmentListSchema, checkListSchema, fileMapSchema } from '../schemas.js';
import { isRecord } from '../utils.js';
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
  type ConflictCode,
  type Ledger,
  type NewDeployment,
  type SubmissionFilter,
  type TaskFilter,
} from './ledger.js';

function toDate(millis: number | undefined): Date {
  return millis === undefined ? new Date() : new Date(millis);
}

function taskFromRow(row: Selectable<TasksTable>): Task {
  return {
    email: row.email,
    taskId: row.task_id,
    round: row.round,
    nonce: row.nonce,
    templateId: row.template_id,
    brief: row.brief,
    checks: checkListSchema.parse(row.checks),
    attachments: attachmentListSchema.parse(row.attachments),
    evaluationUrl: row.evaluation_url,
    endpoint: row.endpoint,
    secret: row.secret,
    dispatchStatus: row.dispatch_status,
    dispatchError: row.dispatch_error,
    createdAt: row.created_at.getTime(),
  };
}

function submissionFromRow(row: Selectable<SubmissionsTable>): Submission {
  return {
    email: row.email,
    taskId: row.task_id,
    round: row.round,
    nonce: row.nonce,
    repoUrl: row.repo_url,
    commitSha: row.commit_sha,
    pagesUrl: row.pages_url,
    receivedAt: row.received_at.getTime(),
  };
}

function resultFromRow(row: Selectable<ResultsTable>): Result {
  return {
    email: row.email,
    taskId: row.task_id,
    round: row.round,
    repoUrl: row.repo_url,
    commitSha: row.commit_sha,
    pagesUrl: row.pages_url,
    checkName: row.check_name,
    score: Number(row.score),
    reason: row.reason,
    logs: row.logs,
    createdAt: row.created_at.getTime(),
  };
}

function deploymentFromRow(row: Selectable<DeploymentsTable>): Deployment {
  return {
    taskId: row.task_id,
    round: row.round,
    repoUrl: row.repo_url,
    commitSha: row.commit_sha,
    pagesUrl: row.pages_url,
    files: fileMapSchema.parse(row.files),
    updatedAt: row.updated_at.getTime(),
  };
}

function resultToRow(r: NewResult) {
  return {
    email: r.email,
    task_id: r.taskId,
    round: r.round,
    repo_url: r.repoUrl,
    commit_sha: r.commitSha,
    pages_url: r.pagesUrl,
    check_name: r.checkName,
    score: r.score,
    reason: r.reason,
    logs: r.logs,
    created_at: toDate(r.createdAt),
  };
}

// 23505 = unique_violation
function uniqueViolation(err: unknown): string | undefined {
  if (!isRecord(err) || err.code !== '23505') return undefined;
  return typeof err.constraint === 'string' ? err.constraint : '';
}

// 23503 = foreign_key_violation
function isForeignKeyViolation(err: unknown): boolean {
  return isRecord(err) && err.code === '23503';
}

function conflictOrRethrow(err: unknown, byConstraint: Record<string, ConflictCode>, fallback: ConflictCode, detail: string): never {
  const constraint = uniqueViolation(err);
  if (constraint === undefined) throw err;
  throw new LedgerConflictError(byConstraint[constraint] ?? fallback, detail);
}

function whereAssignment(key: AssignmentKey) {
  return { email: key.email, task_id: key.taskId, round: key.round };
}

export class PgLedger implements Ledger {
  constructor(
    private readonly db: Kysely<DB>,
    private readonly onClose: () => Promise<void> = async () => {}
  ) {}

  async insertTask(task: NewTask): Promise<Task> {
    try {
      const row = await this.db
        .insertInto('tasks')
        .values({
          email: task.email,
          task_id: task.taskId,
          round: task.round,
          nonce: task.nonce,
          template_id: task.templateId,
          brief: task.brief,
          checks: JSON.stringify(task.checks),
          attachments: JSON.stringify(task.attachments),
          evaluation_url: task.evaluationUrl,
          endpoint: task.endpoint,
          secret: task.secret,
          dispatch_status: task.dispatchStatus,
          dispatch_error: task.dispatchError,
          created_at: toDate(task.createdAt),
        })
        .returningAll()
        .executeTakeFirstOrThrow();
      return taskFromRow(row);
    } catch (err) {
      return conflictOrRethrow(err, { tasks_nonce_uidx: 'duplicate_nonce' }, 'duplicate_task', assignmentLabel(task));
    }
  }

  async getTask(key: AssignmentKey): Promise<Task | undefined> {
    const w = whereAssignment(key);
    const row = await this.db
      .selectFrom('tasks')
      .selectAll()
      .where('email', '=', w.email)
      .where('task_id', '=', w.task_id)
      .where('round', '=', w.round)
      .executeTakeFirst();
    return row ? taskFromRow(row) : undefined;
  }

  async getTaskByNonce(nonce: string): Promise<Task | undefined> {
    const row = await this.db.selectFrom('tasks').selectAll().where('nonce', '=', nonce).executeTakeFirst();
    return row ? taskFromRow(row) : undefined;
  }

  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    let q = this.db.selectFrom('tasks').selectAll();
    if (filter.email !== undefined) q = q.where('email', '=', filter.email);
    if (filter.round !== undefined) q = q.where('round', '=', filter.round);
    const rows = await q.orderBy('created_at', 'asc').execute();
    return rows.map(taskFromRow);
  }

  async insertSubmission(s: NewSubmission): Promise<Submission> {
    try {
      const row = await this.db
        .insertInto('submissions')
        .values({
          email: s.email,
          task_id: s.taskId,
          round: s.round,
          nonce: s.nonce,
          repo_url: s.repoUrl,
          commit_sha: s.commitSha,
          pages_url: s.pagesUrl,
          received_at: toDate(s.receivedAt),
        })
        .returningAll()
        .executeTakeFirstOrThrow();
      return submissionFromRow(row);
    } catch (err) {
      if (isForeignKeyViolation(err)) throw new LedgerReferenceError(s.nonce);
      return conflictOrRethrow(err, {}, 'duplicate_submission', assignmentLabel(s));
    }
  }

  async getSubmission(key: AssignmentKey): Promise<Submission | undefined> {
    const w = whereAssignment(key);
    const row = await this.db
      .selectFrom('submissions')
      .selectAll()
      .where('email', '=', w.email)
      .where('task_id', '=', w.task_id)
      .where('round', '=', w.round)
      .executeTakeFirst();
    return row ? submissionFromRow(row) : undefined;
  }

  async listSubmissions(filter: SubmissionFilter = {}): Promise<Submission[]> {
    let q = this.db.selectFrom('submissions').selectAll('submissions');
    if (filter.round !== undefined) q = q.where('submissions.round', '=', filter.round);
    if (filter.unevaluated) {
      q = q.where(({ not, exists, selectFrom }) =>
        not(
          exists(
            selectFrom('results')
              .select('results.id')
              .whereRef('results.email', '=', 'submissions.email')
              .whereRef('results.task_id', '=', 'submissions.task_id')
              .whereRef('results.round', '=', 'submissions.round')
          )
        )
      );
    }
    const rows = await q.orderBy('submissions.received_at', 'asc').execute();
    return rows.map(submissionFromRow);
  }

  async hasResults(key: AssignmentKey): Promise<boolean> {
    const w = whereAssignment(key);
    const row = await this.db
      .selectFrom('results')
      .select('id')
      .where('email', '=', w.email)
      .where('task_id', '=', w.task_id)
      .where('round', '=', w.round)
      .limit(1)
      .executeTakeFirst();
    return row !== undefined;
  }

  async listResults(key: AssignmentKey): Promise<Result[]> {
    const w = whereAssignment(key);
    const rows = await this.db
      .selectFrom('results')
      .selectAll()
      .where('email', '=', w.email)
      .where('task_id', '=', w.task_id)
      .where('round', '=', w.round)
      .orderBy('id', 'asc')
      .execute();
    return rows.map(resultFromRow);
  }

  async listAllResults(filter: { round?: number } = {}): Promise<Result[]> {
    let q = this.db.selectFrom('results').selectAll();
    if (filter.round !== undefined) q = q.where('round', '=', filter.round);
    const rows = await q.orderBy('id', 'asc').execute();
    return rows.map(resultFromRow);
  }

  async insertResults(results: NewResult[]): Promise<number> {
    if (!results.length) return 0;
    const res = await this.db.insertInto('results').values(results.map(resultToRow)).executeTakeFirst();
    return Number(res.numInsertedOrUpdatedRows ?? results.length);
  }

  async replaceResults(key: AssignmentKey, results: NewResult[]): Promise<number> {
    return this.db.transaction().execute(async (trx: Transaction<DB>) => {
      const w = whereAssignment(key);
      await trx
        .deleteFrom('results')
        .where('email', '=', w.email)
        .where('task_id', '=', w.task_id)
        .where('round', '=', w.round)
        .execute();
      if (!results.length) return 0;
      await trx.insertInto('results').values(results.map(resultToRow)).execute();
      return results.length;
    });
  }

  async upsertDeployment(d: NewDeployment): Promise<Deployment> {
    const values = {
      task_id: d.taskId,
      round: d.round,
      repo_url: d.repoUrl,
      commit_sha: d.commitSha,
      pages_url: d.pagesUrl,
      files: JSON.stringify(d.files),
      updated_at: new Date(),
    };
    const row = await this.db
      .insertInto('deployments')
      .values(values)
      .onConflict((oc) =>
        oc.column('task_id').doUpdateSet({
          round: values.round,
          repo_url: values.repo_url,
          commit_sha: values.commit_sha,
          pages_url: values.pages_url,
          files: values.files,
          updated_at: values.updated_at,
        })
      )
      .returningAll()
      .executeTakeFirstOrThrow();
    return deploymentFromRow(row);
  }

  async getDeployment(taskId: string): Promise<Deployment | undefined> {
    const row = await this.db.selectFrom('deployments').selectAll().where('task_id', '=', taskId).executeTakeFirst();
    return row ? deploymentFromRow(row) : undefined;
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}

export async function createPgLedger(databaseUrl?: string, opts: { migrate?: boolean } = {}): Promise<PgLedger> {
  const handle: DbHandle = createDb(databaseUrl);
  if (opts.migrate ?? true) {
    try {
      await runMigrations(handle.db);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }
  return new PgLedger(handle.db, handle.close);
}
