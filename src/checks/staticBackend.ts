import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { getText, type FetchLike } from '../http.js';
import { envNumber, errorMessage, truncate } from '../utils.js';
import {
  CLICKABLE_SELECTOR,
  interactionUnsupported,
  matchesButtonText,
  type BackendSession,
  type CheckBackend,
  type CheckVerdict,
  type PageLoad,
} from './backend.js';
import type { KnownCheck } from './descriptors.js';

function runOnDocument($: CheerioAPI, check: KnownCheck): CheckVerdict {
  switch (check.type) {
    case 'element_exists': {
      const found = $(check.selector);
      const count = found.length;
      return {
        score: count >= check.min_count ? 1 : 0,
        reason: `Found ${count} element(s) matching "${check.selector}" (need ${check.min_count})`,
        logs: count ? $.html(found.first()) : '',
      };
    }
    case 'button_exists': {
      const labels = $(CLICKABLE_SELECTOR)
        .toArray()
        .map((el) => {
          const node = $(el);
          return node.is('input') ? (node.attr('value') ?? '') : node.text();
        });
      const hit = labels.find((l) => matchesButtonText(l, check.text));
      return hit !== undefined
        ? { score: 1, reason: `Found button "${hit.trim()}"` }
        : { score: 0, reason: `No button with text ${check.text.map((t) => `"${t}"`).join(' / ')}`, logs: labels.join(' | ') };
    }
    default:
      return interactionUnsupported(check);
  }
}

class StaticSession implements BackendSession {
  private doc: CheerioAPI | undefined;

  constructor(
    private readonly timeoutMs: number,
    private readonly fetchImpl?: FetchLike
  ) {}

  async load(url: string): Promise<PageLoad> {
    try {
      const res = await getText(url, { timeoutMs: this.timeoutMs, fetchImpl: this.fetchImpl });
      if (res.status !== 200) return { ok: false, reason: `Page returned HTTP ${res.status}`, logs: truncate(res.text, 500) };
      this.doc = cheerio.load(res.text);
      return { ok: true };
    } catch (err) {
      return { ok: false, reason: `Failed to load page: ${errorMessage(err)}` };
    }
  }

  async run(check: KnownCheck): Promise<CheckVerdict> {
    if (!this.doc) throw new Error('page_not_loaded');
    return runOnDocument(this.doc, check);
  }

  async close(): Promise<void> {
    this.doc = undefined;
  }
}

export class StaticBackend implements CheckBackend {
  readonly name = 'static' as const;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: FetchLike;

  constructor(opts: { timeoutMs?: number; fetchImpl?: FetchLike } = {}) {
    this.timeoutMs = opts.timeoutMs ?? envNumber('STATIC_FETCH_TIMEOUT_MS', 20_000);
    this.fetchImpl = opts.fetchImpl;
  }

  async launch(): Promise<BackendSession> {
    return new StaticSession(this.timeoutMs, this.fetchImpl);
  }
}
