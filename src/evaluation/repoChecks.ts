import { getText, type FetchLike } from '../http.js';
import type { CheckOutcome } from '../checks/backend.js';
import { LOG_EXCERPT_CHARS } from '../checks/engine.js';
import type { Submission } from '../types.js';
import { errorMessage, truncate } from '../utils.js';

export const REPO_CHECK_NAMES = ['mit_license', 'readme_quality', 'code_quality'] as const;

export interface RepoCheckOptions {
  rawBaseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export type RepoChecker = (submission: Pick<Submission, 'repoUrl' | 'commitSha'>) => Promise<CheckOutcome[]>;

// https://github.com/owner/name(.git) -> owner/name
export function repoSlug(repoUrl: string): string | undefined {
  let u: URL;
  try {
    u = new URL(repoUrl);
  } catch {
    return undefined;
  }
  const parts = u.pathname.replace(/\.git$/, '').split('/').filter(Boolean);
  const [owner, name] = parts;
  return owner && name ? `${owner}/${name}` : undefined;
}

function scoreHeuristics(flags: boolean[]): number {
  return flags.filter(Boolean).length / flags.length;
}

export function scoreReadme(text: string): { score: number; reason: string } {
  const flags = {
    length: text.length > 200,
    headings: /^#{1,6}\s/m.test(text),
    usage: /usage|setup|install/i.test(text),
    description: /description|about|summary/i.test(text),
    license: /license/i.test(text),
  };
  const met = Object.entries(flags).filter(([, v]) => v).map(([k]) => k);
  return { score: scoreHeuristics(Object.values(flags)), reason: `README covers: ${met.join(', ') || 'nothing'}` };
}

export function scoreCode(files: { html: string; js: string; css: string }): { score: number; reason: string } {
  const all = `${files.html}\n${files.js}\n${files.css}`;
  const flags = {
    substance: all.trim().length > 100,
    declarations: /\b(function|const|let)\b/.test(all),
    events: /addEventListener|onclick|querySelector/.test(all),
    styling: files.css.trim().length > 0 || /<style|\.css/.test(files.html),
    comments: /\/\/|\/\*|<!--/.test(all),
  };
  const met = Object.entries(flags).filter(([, v]) => v).map(([k]) => k);
  return { score: scoreHeuristics(Object.values(flags)), reason: `Code shows: ${met.join(', ') || 'nothing'}` };
}

export function createRepoChecker(opts: RepoCheckOptions = {}): RepoChecker {
  const base = (opts.rawBaseUrl ?? process.env.RAW_CONTENT_BASE_URL ?? 'https://raw.githubusercontent.com').replace(/\/+$/, '');
  const timeoutMs = opts.timeoutMs ?? 20_000;

  return async (submission) => {
    const slug = repoSlug(submission.repoUrl);
    if (!slug) {
      return REPO_CHECK_NAMES.map((name) => ({ name, score: 0, reason: `Unrecognized repository URL: ${submission.repoUrl}`, logs: '' }));
    }

    const fetchFile = async (file: string): Promise<string | undefined> => {
      const res = await getText(`${base}/${slug}/${submission.commitSha}/${file}`, { timeoutMs, fetchImpl: opts.fetchImpl });
      return res.status === 200 ? res.text : undefined;
    };
    const guarded = async (name: string, fn: () => Promise<Omit<CheckOutcome, 'name'>>): Promise<CheckOutcome> => {
      try {
        const r = await fn();
        return { name, ...r, logs: truncate(r.logs, LOG_EXCERPT_CHARS) };
      } catch (err) {
        return { name, score: 0, reason: `Error: ${errorMessage(err)}`, logs: '' };
      }
    };

    const license = await guarded('mit_license', async () => {
      const text = await fetchFile('LICENSE');
      if (text === undefined) return { score: 0, reason: 'LICENSE file not found', logs: '' };
      const mit = text.toLowerCase().includes('mit');
      return { score: mit ? 1 : 0, reason: mit ? 'MIT license present' : 'LICENSE is not MIT', logs: text };
    });

    const readme = await guarded('readme_quality', async () => {
      const text = await fetchFile('README.md');
      if (text === undefined) return { score: 0, reason: 'README.md not found', logs: '' };
      return { ...scoreReadme(text), logs: text };
    });

    const code = await guarded('code_quality', async () => {
      const [html, js, css] = [await fetchFile('index.html'), await fetchFile('script.js'), await fetchFile('style.css')];
      if (html === undefined && js === undefined && css === undefined) {
        return { score: 0, reason: 'No index.html, script.js or style.css found', logs: '' };
      }
      return { ...scoreCode({ html: html ?? '', js: js ?? '', css: css ?? '' }), logs: html ?? js ?? css ?? '' };
    });

    return [license, readme, code];
  };
}
