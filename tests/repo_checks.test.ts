import { describe, expect, it } from 'vitest';
import { createRepoChecker, repoSlug, scoreCode, scoreReadme } from '../src/evaluation/repoChecks.js';
import type { FetchLike } from '../src/http.js';

function rawFiles(files: Record<string, string>): { fetchImpl: FetchLike; urls: string[] } {
  const urls: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    urls.push(url);
    const name = url.split('/').pop() ?? '';
    const body = files[name];
    return body === undefined ? new Response('404: Not Found', { status: 404 }) : new Response(body, { status: 200 });
  };
  return { fetchImpl, urls };
}

const submission = { repoUrl: 'https://github.com/student/calculator-abc12.git', commitSha: 'c0ffee' };

describe('Repository checks', () => {
  it('extracts owner/name from repository URLs', () => {
    expect(repoSlug('https://github.com/student/calculator-abc12')).toBe('student/calculator-abc12');
    expect(repoSlug('https://github.com/student/calculator-abc12.git')).toBe('student/calculator-abc12');
    expect(repoSlug('https://github.com/student')).toBeUndefined();
    expect(repoSlug('not a url')).toBeUndefined();
  });

  it('scores README heuristics in steps of 0.2', () => {
    expect(scoreReadme('').score).toBe(0);
    expect(scoreReadme('# Title\n\nAbout this page.').score).toBe(0.4);
    const full = `# Calculator\n\n## Description\n${'A small calculator. '.repeat(12)}\n## Usage\nOpen index.html.\n## License\nMIT`;
    expect(scoreReadme(full)).toEqual({ score: 1, reason: 'README covers: length, headings, usage, description, license' });
  });

  it('scores code heuristics across html, js and css', () => {
    expect(scoreCode({ html: '', js: '', css: '' }).score).toBe(0);
    const out = scoreCode({
      html: '<link rel="stylesheet" href="style.css"><button id="go">Go</button>',
      js: '// wire up\nconst go = document.querySelector("#go");\ngo.addEventListener("click", () => {});',
      css: 'button { color: red; }',
    });
    expect(out).toEqual({ score: 1, reason: 'Code shows: substance, declarations, events, styling, comments' });
  });

  it('fetches files at the submitted commit', async () => {
    const { fetchImpl, urls } = rawFiles({ LICENSE: 'MIT License\n\nCopyright (c) 2025 student' });
    const check = createRepoChecker({ rawBaseUrl: 'https://raw.example.test/', fetchImpl });
    const out = await check(submission);

    expect(out.map((o) => [o.name, o.score])).toEqual([
      ['mit_license', 1],
      ['readme_quality', 0],
      ['code_quality', 0],
    ]);
    expect(urls[0]).toBe('https://raw.example.test/student/calculator-abc12/c0ffee/LICENSE');
    expect(out[1]?.reason).toBe('README.md not found');
  });

  it('fails the license check for a non-MIT license', async () => {
    const { fetchImpl } = rawFiles({ LICENSE: 'Apache License 2.0' });
    const [license] = await createRepoChecker({ rawBaseUrl: 'https://raw.example.test', fetchImpl })(submission);
    expect(license).toMatchObject({ name: 'mit_license', score: 0, reason: 'LICENSE is not MIT' });
  });

  it('scores every repository check 0 for an unrecognised URL', async () => {
    const { fetchImpl, urls } = rawFiles({});
    const out = await createRepoChecker({ fetchImpl })({ repoUrl: 'ftp:nowhere', commitSha: 'c0ffee' });
    expect(out.map((o) => o.score)).toEqual([0, 0, 0]);
    expect(urls).toEqual([]);
  });

  it('turns a fetch error into an error result', async () => {
    const check = createRepoChecker({
      rawBaseUrl: 'https://raw.example.test',
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });
    const out = await check(submission);
    expect(out[0]).toEqual({ name: 'mit_license', score: 0, reason: 'Error: fetch failed', logs: '' });
  });
});
