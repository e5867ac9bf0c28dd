import type { Catalog } from '../../src/tasks/catalog.js';
import { parseCatalog } from '../../src/tasks/catalog.js';
import type { NewSubmission, NewTask } from '../../src/types.js';

export function taskFixture(overrides: Partial<NewTask> = {}): NewTask {
  return {
    email: 'student@example.com',
    taskId: 'calculator-abc12',
    round: 1,
    nonce: 'nonce-1',
    templateId: 'calculator',
    brief: 'Build a calculator page',
    checks: [{ type: 'element_exists', selector: 'button', min_count: 1 }],
    attachments: [],
    evaluationUrl: 'http://collector.test/api/evaluation',
    endpoint: 'http://student.test/task',
    secret: 'test-secret',
    dispatchStatus: 200,
    dispatchError: null,
    ...overrides,
  };
}

export function submissionFixture(overrides: Partial<NewSubmission> = {}): NewSubmission {
  return {
    email: 'student@example.com',
    taskId: 'calculator-abc12',
    round: 1,
    nonce: 'nonce-1',
    repoUrl: 'https://github.com/student/calculator-abc12',
    commitSha: 'c0ffee',
    pagesUrl: 'https://student.github.io/calculator-abc12/',
    ...overrides,
  };
}

// Two-template catalog with short briefs, for tests that need predictable content.
export function smallCatalog(): Catalog {
  return parseCatalog({
    templates: [
      {
        id: 'calculator',
        name: 'Calculator',
        rounds: {
          '1': {
            brief: 'Calculator with {digits} digits',
            params: { digits: [8, 10] },
            checks: [{ type: 'element_exists', selector: 'button', min_count: 2 }],
          },
          '2': {
            brief: 'Add a {mode} mode',
            params: { mode: ['dark', 'scientific'] },
            checks: [{ type: 'button_exists', text: ['sin', 'cos'] }],
          },
        },
      },
      {
        id: 'quiz-app',
        name: 'Quiz',
        critical_checks: ['page_load', 'quiz_questions'],
        rounds: {
          '1': {
            brief: 'Quiz with {n} questions',
            params: { n: [5, 10] },
            checks: [{ type: 'element_exists', name: 'quiz_questions', selector: '.question' }],
          },
          '2': {
            brief: 'Add a timer of {t} seconds',
            params: { t: [30, 60] },
            checks: [{ type: 'element_exists', selector: '.timer' }],
          },
        },
      },
    ],
  });
}
