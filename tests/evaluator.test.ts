import { describe, expect, it } from 'vitest';
import type { PageChecker } from '../src/checks/engine.js';
import { runEvaluation } from '../src/evaluation/evaluator.js';
import type { RepoChecker } from '../src/evaluation/repoChecks.js';
import { MemoryLedger } from '../src/ledger/memoryLedger.js';
import type { Task } from '../src/types.js';
import { submissionFixture, taskFixture } from './helpers/fixtures.js';

function fakePageChecker(score = 1) {
  const visited: string[] = [];
  const check: PageChecker = async (url, checks) => {
    visited.push(url);
    return {
      backend: 'static',
      outcomes: checks.map((c, i) => ({ name: `${c.type}_${i}`, score, reason: 'fake', logs: '' })),
    };
  };
  return { check, visited };
}

const repoChecks: RepoChecker = async () => [{ name: 'mit_license', score: 1, reason: 'MIT license present', logs: '' }];

// Loses the task behind one nonce, as if its row had been removed after the submission arrived.
class TaskLossLedger extends MemoryLedger {
  async getTaskByNonce(nonce: string): Promise<Task | undefined> {
    return nonce === 'nonce-ghost' ? undefined : super.getTaskByNonce(nonce);
  }
}

async function seeded() {
  const ledger = new MemoryLedger();
  await ledger.insertTask(taskFixture());
  await ledger.insertSubmission(submissionFixture());
  return ledger;
}

describe('Evaluation batch', () => {
  it('writes repository and page results for a submission', async () => {
    const ledger = await seeded();
    const page = fakePageChecker();
    const summary = await runEvaluation({ ledger, pageChecks: page.check, repoChecks, round: 1 });

    expect(summary).toEqual({ evaluated: 1, skipped: 0, failed: 0, total: 1 });
    expect(page.visited).toEqual(['https://student.github.io/calculator-abc12/']);
    const results = await ledger.listResults({ email: 'student@example.com', taskId: 'calculator-abc12', round: 1 });
    expect(results.map((r) => [r.checkName, r.score, r.commitSha])).toEqual([
      ['mit_license', 1, 'c0ffee'],
      ['element_exists_0', 1, 'c0ffee'],
    ]);
  });

  it('evaluates an assignment only once', async () => {
    const ledger = await seeded();
    const page = fakePageChecker();
    await runEvaluation({ ledger, pageChecks: page.check });

    expect(await runEvaluation({ ledger, pageChecks: page.check })).toEqual({ evaluated: 0, skipped: 1, failed: 0, total: 1 });
    expect(await runEvaluation({ ledger, pageChecks: page.check, round: 1 })).toEqual({ evaluated: 0, skipped: 0, failed: 0, total: 0 });
    expect(page.visited).toHaveLength(1);
    expect(await ledger.listAllResults()).toHaveLength(1);
  });

  it('replaces results when forced', async () => {
    const ledger = await seeded();
    await runEvaluation({ ledger, pageChecks: fakePageChecker(1).check });
    const summary = await runEvaluation({ ledger, pageChecks: fakePageChecker(0).check, round: 1, force: true });

    expect(summary.evaluated).toBe(1);
    const results = await ledger.listAllResults();
    expect(results.map((r) => r.score)).toEqual([0]);
  });

  it('counts a submission whose task cannot be read as failed and carries on', async () => {
    const ledger = new TaskLossLedger();
    await ledger.insertTask(taskFixture());
    await ledger.insertSubmission(submissionFixture());
    await ledger.insertTask(taskFixture({ email: 'ghost@example.com', nonce: 'nonce-ghost' }));
    await ledger.insertSubmission(submissionFixture({ email: 'ghost@example.com', nonce: 'nonce-ghost' }));
    const summary = await runEvaluation({ ledger, pageChecks: fakePageChecker().check, round: 1 });
    expect(summary).toEqual({ evaluated: 1, skipped: 0, failed: 1, total: 2 });
  });

  it('counts a page checker crash as failed', async () => {
    const ledger = await seeded();
    const summary = await runEvaluation({
      ledger,
      pageChecks: async () => {
        throw new Error('static backend unavailable');
      },
    });
    expect(summary).toEqual({ evaluated: 0, skipped: 0, failed: 1, total: 1 });
    expect(await ledger.listAllResults()).toEqual([]);
  });
});
