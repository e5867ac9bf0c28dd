import { afterEach, describe, expect, it } from 'vitest';
import { isEligibleForNextRound, runRound2 } from '../src/dispatch/dispatcher.js';
import { MemoryLedger } from '../src/ledger/memoryLedger.js';
import { generateTask, templateIdFromTaskId } from '../src/tasks/generator.js';
import type { NewResult, Submission } from '../src/types.js';
import { smallCatalog, submissionFixture, taskFixture } from './helpers/fixtures.js';
import { startStub, type StubServer } from './helpers/stubServer.js';

const CRITICAL = ['mit_license', 'page_load'];

function result(sub: Submission, checkName: string, score: number): NewResult {
  return {
    email: sub.email,
    taskId: sub.taskId,
    round: sub.round,
    repoUrl: sub.repoUrl,
    commitSha: sub.commitSha,
    pagesUrl: sub.pagesUrl,
    checkName,
    score,
    reason: '',
    logs: '',
  };
}

async function seeded(endpoint = 'http://student.test/task') {
  const ledger = new MemoryLedger();
  await ledger.insertTask(taskFixture({ endpoint, secret: 'test-secret-r1' }));
  const sub = await ledger.insertSubmission(submissionFixture());
  return { ledger, sub };
}

describe('Round 2 eligibility', () => {
  let stub: StubServer | undefined;

  afterEach(async () => {
    await stub?.close();
    stub = undefined;
  });

  it('is eligible with a warning when round 1 has no results', async () => {
    const { ledger, sub } = await seeded();
    expect(await isEligibleForNextRound(ledger, sub, { criticalChecks: CRITICAL })).toEqual({ eligible: true, warning: 'no_results' });
  });

  it('is not eligible when a critical check scored 0', async () => {
    const { ledger, sub } = await seeded();
    await ledger.insertResults([result(sub, 'mit_license', 0), result(sub, 'page_load', 1)]);
    expect(await isEligibleForNextRound(ledger, sub, { criticalChecks: CRITICAL })).toEqual({
      eligible: false,
      reason: 'critical_check_failed:mit_license',
    });
  });

  it('ignores zero scores on non-critical checks', async () => {
    const { ledger, sub } = await seeded();
    await ledger.insertResults([result(sub, 'code_quality', 0), result(sub, 'mit_license', 1)]);
    expect(await isEligibleForNextRound(ledger, sub, { criticalChecks: CRITICAL })).toEqual({ eligible: true });
  });

  it('is not eligible once a round 2 task exists for the same lineage', async () => {
    const { ledger, sub } = await seeded();
    await ledger.insertTask(taskFixture({ round: 2, taskId: 'calculator-r2r2r', nonce: 'nonce-r2' }));
    expect(await isEligibleForNextRound(ledger, sub, { criticalChecks: CRITICAL })).toEqual({
      eligible: false,
      reason: 'next_round_task_exists',
    });
  });

  it('dispatches round 2 to the round 1 endpoint with the round 1 secret', async () => {
    stub = await startStub(() => ({ status: 200 }));
    const { ledger } = await seeded(`${stub.url}/task`);
    const catalog = smallCatalog();

    const summary = await runRound2({
      ledger,
      catalog,
      evaluationUrl: 'http://collector.test/api/evaluation',
      hourBucket: '2025-10-16-14',
      interDelayMs: 0,
      criticalChecks: CRITICAL,
      newNonce: () => 'nonce-round2',
    });

    expect(summary).toEqual({ processed: 1, skipped: 0, failed: 0, total: 1 });
    const expected = generateTask({
      catalog,
      round: 2,
      email: 'student@example.com',
      hourBucket: '2025-10-16-14',
      previousTaskId: 'calculator-abc12',
    });
    const body = stub.requests[0]?.json();
    expect(body).toMatchObject({ round: 2, task: expected.taskId, secret: 'test-secret-r1', nonce: 'nonce-round2' });
    expect(templateIdFromTaskId(expected.taskId)).toBe('calculator');

    const again = await runRound2({
      ledger,
      catalog,
      evaluationUrl: 'http://collector.test/api/evaluation',
      hourBucket: '2025-10-16-14',
      interDelayMs: 0,
      criticalChecks: CRITICAL,
    });
    expect(again).toEqual({ processed: 0, skipped: 1, failed: 0, total: 1 });
    expect(stub.requests).toHaveLength(1);
  });

  it('uses the template critical checks when the template defines them', async () => {
    const ledger = new MemoryLedger();
    await ledger.insertTask(taskFixture({ taskId: 'quiz-app-q1q1q', templateId: 'quiz-app' }));
    const sub = await ledger.insertSubmission(submissionFixture({ taskId: 'quiz-app-q1q1q' }));
    await ledger.insertResults([result(sub, 'quiz_questions', 0), result(sub, 'mit_license', 1)]);

    const summary = await runRound2({
      ledger,
      catalog: smallCatalog(),
      evaluationUrl: 'http://collector.test/api/evaluation',
      hourBucket: '2025-10-16-14',
      interDelayMs: 0,
      criticalChecks: CRITICAL,
    });
    expect(summary).toEqual({ processed: 0, skipped: 1, failed: 0, total: 1 });
  });

  it('counts a submission whose template is gone as failed', async () => {
    const ledger = new MemoryLedger();
    await ledger.insertTask(taskFixture({ taskId: 'retired-abcde', templateId: 'retired' }));
    await ledger.insertSubmission(submissionFixture({ taskId: 'retired-abcde' }));

    const summary = await runRound2({
      ledger,
      catalog: smallCatalog(),
      evaluationUrl: 'http://collector.test/api/evaluation',
      hourBucket: '2025-10-16-14',
      interDelayMs: 0,
      criticalChecks: CRITICAL,
    });
    expect(summary).toEqual({ processed: 0, skipped: 0, failed: 1, total: 1 });
    expect(await ledger.listTasks({ round: 2 })).toEqual([]);
  });
});
