import { LedgerConflictError, type Ledger } from './ledger/ledger.js';
import type { SubmissionBody } from './schemas.js';
import type { Submission } from './types.js';

export type SubmissionRejectCode = 'invalid_nonce' | 'email_mismatch' | 'task_mismatch' | 'round_mismatch' | 'duplicate_submission';

export class SubmissionRejectedError extends Error {
  readonly code: SubmissionRejectCode;

  constructor(code: SubmissionRejectCode, message: string) {
    super(message);
    this.name = 'SubmissionRejectedError';
    this.code = code;
  }
}

/**
 * Record a participant's submission. The nonce must belong to a task issued to the same
 * email, task id and round; anything else is rejected and nothing is stored.
 */
export async function ingestSubmission(ledger: Ledger, body: SubmissionBody): Promise<Submission> {
  const task = await ledger.getTaskByNonce(body.nonce);
  if (!task) throw new SubmissionRejectedError('invalid_nonce', 'Unknown nonce');
  if (task.email !== body.email) throw new SubmissionRejectedError('email_mismatch', 'Email does not match the task for this nonce');
  if (task.taskId !== body.task) throw new SubmissionRejectedError('task_mismatch', 'Task id does not match the task for this nonce');
  if (task.round !== body.round) throw new SubmissionRejectedError('round_mismatch', 'Round does not match the task for this nonce');

  const key = { email: body.email, taskId: body.task, round: body.round };
  if (await ledger.getSubmission(key)) {
    throw new SubmissionRejectedError('duplicate_submission', 'A submission for this task and round already exists');
  }

  try {
    const submission = await ledger.insertSubmission({
      ...key,
      nonce: body.nonce,
      repoUrl: body.repo_url,
      commitSha: body.commit_sha,
      pagesUrl: body.pages_url,
    });
    console.log(`[ingest] email=${submission.email} task=${submission.taskId} round=${submission.round} accepted`);
    return submission;
  } catch (err) {
    // Lost a race with a concurrent post for the same assignment.
    if (err instanceof LedgerConflictError) {
      throw new SubmissionRejectedError('duplicate_submission', 'A submission for this task and round already exists');
    }
    throw err;
  }
}
