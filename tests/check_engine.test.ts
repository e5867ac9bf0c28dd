import { describe, expect, it } from 'vitest';
import type { BackendName, BackendSession, CheckBackend, CheckVerdict, PageLoad } from '../src/checks/backend.js';
import { createPageChecker, runChecks } from '../src/checks/engine.js';
import { parseChecks, type KnownCheck } from '../src/checks/descriptors.js';

class FakeBackend implements CheckBackend {
  launches = 0;
  closes = 0;
  ran: string[] = [];

  constructor(
    readonly name: BackendName,
    private readonly behaviour: {
      launchError?: string;
      load?: PageLoad;
      run?: (check: KnownCheck) => CheckVerdict;
    } = {}
  ) {}

  async launch(): Promise<BackendSession> {
    this.launches++;
    if (this.behaviour.launchError) throw new Error(this.behaviour.launchError);
    return {
      load: async () => this.behaviour.load ?? { ok: true },
      run: async (check) => {
        this.ran.push(check.type);
        return this.behaviour.run ? this.behaviour.run(check) : { score: 1, reason: 'ok' };
      },
      close: async () => {
        this.closes++;
      },
    };
  }
}

const checks = parseChecks([
  { type: 'element_exists', selector: 'img' },
  { type: 'hover_magic', selector: 'a' },
  { type: 'click_interaction', selector: '#explode' },
  { type: 'responsive_check' },
]);

describe('Check execution engine', () => {
  it('falls back when the interactive backend cannot launch', async () => {
    const interactive = new FakeBackend('playwright', { launchError: 'no browser installed' });
    const fallback = new FakeBackend('static');
    const out = await runChecks({ url: 'http://page.test/', checks, interactive, fallback });

    expect(out.backend).toBe('static');
    expect(interactive.launches).toBe(1);
    expect(fallback.launches).toBe(1);
    expect(fallback.closes).toBe(1);
  });

  it('runs known checks in order, skipping unknown ones', async () => {
    const interactive = new FakeBackend('playwright');
    const out = await runChecks({ url: 'http://page.test/', checks, interactive, fallback: new FakeBackend('static') });

    expect(out.backend).toBe('playwright');
    expect(interactive.ran).toEqual(['element_exists', 'click_interaction', 'responsive_check']);
    expect(out.outcomes.map((o) => o.name)).toEqual(['element_img', 'click_interaction', 'responsive_design']);
  });

  it('scores a throwing check 0 and keeps going', async () => {
    const interactive = new FakeBackend('playwright', {
      run: (check) => {
        if (check.type === 'click_interaction') throw new Error('boom');
        return { score: 0.75, reason: 'fine' };
      },
    });
    const out = await runChecks({ url: 'http://page.test/', checks, interactive, fallback: new FakeBackend('static') });

    expect(out.outcomes).toEqual([
      { name: 'element_img', score: 0.75, reason: 'fine', logs: '' },
      { name: 'click_interaction', score: 0, reason: 'Error: boom', logs: '' },
      { name: 'responsive_design', score: 0.75, reason: 'fine', logs: '' },
    ]);
    expect(interactive.closes).toBe(1);
  });

  it('returns only page_load when the page fails to load and still closes the session', async () => {
    const interactive = new FakeBackend('playwright', { load: { ok: false, reason: 'Failed to load page: timeout' } });
    const out = await runChecks({ url: 'http://page.test/', checks, interactive, fallback: new FakeBackend('static') });

    expect(out.outcomes).toEqual([{ name: 'page_load', score: 0, reason: 'Failed to load page: timeout', logs: '' }]);
    expect(interactive.ran).toEqual([]);
    expect(interactive.closes).toBe(1);
  });

  it('clamps scores and truncates logs', async () => {
    const interactive = new FakeBackend('playwright', { run: () => ({ score: 3, reason: 'loud', logs: 'y'.repeat(800) }) });
    const out = await runChecks({
      url: 'http://page.test/',
      checks: parseChecks([{ type: 'element_exists', selector: 'p' }]),
      interactive,
      fallback: new FakeBackend('static'),
    });
    expect(out.outcomes[0]?.score).toBe(1);
    expect(out.outcomes[0]?.logs).toHaveLength(500);
  });

  it('never launches the browser in static mode', async () => {
    const interactive = new FakeBackend('playwright');
    const fallback = new FakeBackend('static');
    const check = createPageChecker({ mode: 'static', interactive, fallback });
    const out = await check('http://page.test/', checks);

    expect(out.backend).toBe('static');
    expect(interactive.launches).toBe(0);
  });
});
