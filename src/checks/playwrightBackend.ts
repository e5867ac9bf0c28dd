import type { Browser, BrowserContext, Page } from 'playwright-core';
import { envNumber, errorMessage } from '../utils.js';
import {
  CLICKABLE_SELECTOR,
  clampScore,
  matchesButtonText,
  type BackendSession,
  type CheckBackend,
  type CheckVerdict,
  type PageLoad,
} from './backend.js';
import type { KnownCheck } from './descriptors.js';

const VIEWPORT = { width: 1280, height: 800 };
const SETTLE_MS = 500;
const SEQUENCE_STEP_MS = 100;

export const MODAL_SELECTOR = '.modal, .lightbox, [data-lightbox], [role="dialog"]';
const DISPLAY_SELECTORS = ['#display', '.display', '#result', '.result', 'output', 'input[type="text"]'];

async function domChanged(page: Page, act: () => Promise<void>): Promise<boolean> {
  const before = await page.content();
  await act();
  await page.waitForTimeout(SETTLE_MS);
  return (await page.content()) !== before;
}

async function readDisplay(page: Page): Promise<string | undefined> {
  for (const sel of DISPLAY_SELECTORS) {
    const loc = page.locator(sel).first();
    if ((await loc.count()) === 0) continue;
    const tag = (await loc.evaluate((el) => el.tagName)).toLowerCase();
    const text = tag === 'input' || tag === 'textarea' ? await loc.inputValue() : await loc.innerText();
    return text.trim();
  }
  return undefined;
}

function matchDisplay(text: string | undefined, pattern: string): CheckVerdict {
  if (text === undefined) return { score: 0, reason: 'No display element found' };
  const ok = new RegExp(pattern).test(text);
  return { score: ok ? 1 : 0, reason: ok ? `Display shows "${text}"` : `Display shows "${text}", expected /${pattern}/`, logs: text };
}

// "modal_opens", "lightbox_modal" and the like ask for a visible overlay, not just a DOM change.
export function expectsModal(result: string): boolean {
  return /modal|lightbox/i.test(result);
}

async function clickButtonLabelled(page: Page, label: string): Promise<boolean> {
  const byRole = page.getByRole('button', { name: label, exact: true });
  if ((await byRole.count()) > 0) {
    await byRole.first().click();
    return true;
  }
  const byValue = page.locator(`input[value="${label.replace(/"/g, '\\"')}"]`);
  if ((await byValue.count()) > 0) {
    await byValue.first().click();
    return true;
  }
  return false;
}

async function runOnPage(page: Page, check: KnownCheck): Promise<CheckVerdict> {
  switch (check.type) {
    case 'element_exists': {
      const count = await page.locator(check.selector).count();
      return {
        score: count >= check.min_count ? 1 : 0,
        reason: `Found ${count} element(s) matching "${check.selector}" (need ${check.min_count})`,
      };
    }
    case 'button_exists': {
      const clickables = page.locator(CLICKABLE_SELECTOR);
      const labels: string[] = [];
      for (const el of await clickables.all()) {
        const tag = (await el.evaluate((node) => node.tagName)).toLowerCase();
        labels.push(tag === 'input' ? ((await el.getAttribute('value')) ?? '') : await el.innerText());
      }
      const hit = labels.find((l) => matchesButtonText(l, check.text));
      return hit !== undefined
        ? { score: 1, reason: `Found button "${hit.trim()}"` }
        : { score: 0, reason: `No button with text ${check.text.map((t) => `"${t}"`).join(' / ')}`, logs: labels.join(' | ') };
    }
    case 'click_interaction': {
      const target = page.locator(check.selector).first();
      if ((await target.count()) === 0) return { score: 0, reason: `No element matching "${check.selector}"` };
      if (expectsModal(check.result)) {
        await target.click();
        await page.waitForTimeout(SETTLE_MS);
        const visible = await page.locator(MODAL_SELECTOR).first().isVisible();
        return visible
          ? { score: 1, reason: 'Modal opened after click' }
          : { score: 0.5, reason: 'Clicked, but no visible modal appeared' };
      }
      const changed = await domChanged(page, () => target.click());
      return changed ? { score: 1, reason: 'Page changed after click' } : { score: 0.5, reason: 'Clicked, but the page did not change' };
    }
    case 'responsive_check': {
      let passed = 0;
      const notes: string[] = [];
      try {
        for (const width of check.breakpoints) {
          await page.setViewportSize({ width, height: VIEWPORT.height });
          await page.waitForTimeout(SETTLE_MS);
          const box = await page.locator('body').boundingBox();
          const ok = box !== null && box.width > 0;
          if (ok) passed++;
          notes.push(`${width}px:${ok ? 'ok' : 'collapsed'}`);
        }
      } finally {
        await page.setViewportSize(VIEWPORT);
      }
      return {
        score: clampScore(passed / check.breakpoints.length),
        reason: `Layout rendered at ${passed}/${check.breakpoints.length} widths`,
        logs: notes.join(' '),
      };
    }
    case 'keyboard_event': {
      const changed = await domChanged(page, () => page.keyboard.press(check.key));
      return changed
        ? { score: 1, reason: `Page changed after ${check.key}` }
        : { score: 0.5, reason: `Pressed ${check.key}, but the page did not change` };
    }
    case 'mouse_event': {
      const target = check.selector ? page.locator(check.selector).first() : undefined;
      if (target && (await target.count()) === 0) return { score: 0, reason: `No element matching "${check.selector}"` };
      const changed = await domChanged(page, async () => {
        if (check.action === 'click') {
          await (target ? target.click() : page.mouse.click(VIEWPORT.width / 2, VIEWPORT.height / 2));
          return;
        }
        if (target) await target.hover();
        else await page.mouse.move(VIEWPORT.width / 2, VIEWPORT.height / 2);
        await page.mouse.wheel(0, -300);
      });
      return changed
        ? { score: 1, reason: `Page changed after mouse ${check.action}` }
        : { score: 0.5, reason: `Mouse ${check.action} sent, but the page did not change` };
    }
    case 'click_sequence': {
      for (const label of check.buttons) {
        if (!(await clickButtonLabelled(page, label))) return { score: 0, reason: `Button "${label}" not found` };
        await page.waitForTimeout(SEQUENCE_STEP_MS);
      }
      return matchDisplay(await readDisplay(page), check.result);
    }
    case 'keyboard_input': {
      await page.keyboard.type(check.keys);
      await page.keyboard.press('Enter');
      await page.waitForTimeout(SETTLE_MS);
      return matchDisplay(await readDisplay(page), check.result);
    }
  }
}

class PlaywrightSession implements BackendSession {
  private readonly consoleLines: string[] = [];

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly loadTimeoutMs: number
  ) {
    page.on('console', (msg) => this.consoleLines.push(`[console:${msg.type()}] ${msg.text()}`));
    page.on('pageerror', (err) => this.consoleLines.push(`[pageerror] ${err.message}`));
  }

  async load(url: string): Promise<PageLoad> {
    try {
      const resp = await this.page.goto(url, { waitUntil: 'load', timeout: this.loadTimeoutMs });
      if (resp && resp.status() >= 400) {
        return { ok: false, reason: `Page returned HTTP ${resp.status()}`, logs: this.consoleLines.join('\n') };
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, reason: `Failed to load page: ${errorMessage(err)}`, logs: this.consoleLines.join('\n') };
    }
  }

  run(check: KnownCheck): Promise<CheckVerdict> {
    return runOnPage(this.page, check);
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

export class PlaywrightBackend implements CheckBackend {
  readonly name = 'playwright' as const;
  private readonly loadTimeoutMs: number;

  constructor(opts: { loadTimeoutMs?: number } = {}) {
    this.loadTimeoutMs = opts.loadTimeoutMs ?? envNumber('PAGE_LOAD_TIMEOUT_MS', 30_000);
  }

  async launch(): Promise<BackendSession> {
    const { chromium } = await import('playwright-core');
    const browser = await chromium.launch({ headless: true });
    try {
      const context = await browser.newContext({ viewport: VIEWPORT, locale: 'en-US', timezoneId: 'UTC' });
      const page = await context.newPage();
      return new PlaywrightSession(browser, context, page, this.loadTimeoutMs);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }
}
