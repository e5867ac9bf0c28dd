import { errorMessage, isAbortError } from './utils.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type PostOutcome =
  | { kind: 'response'; status: number; text: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'error'; message: string };

export interface PostJsonOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

/** POST a JSON body once. Never throws; transport failures come back as outcomes. */
export async function postJson(url: string, body: unknown, opts: PostJsonOptions): Promise<PostOutcome> {
  const doFetch = opts.fetchImpl ?? fetch;
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), opts.timeoutMs);
  try {
    const resp = await doFetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...(opts.headers ?? {}) },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    const text = await resp.text();
    return { kind: 'response', status: resp.status, text };
  } catch (err) {
    if (isAbortError(err)) return { kind: 'timeout', timeoutMs: opts.timeoutMs };
    return { kind: 'error', message: errorMessage(err) };
  } finally {
    clearTimeout(t);
  }
}

export async function getText(
  url: string,
  opts: { timeoutMs: number; fetchImpl?: FetchLike }
): Promise<{ status: number; text: string }> {
  const doFetch = opts.fetchImpl ?? fetch;
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), opts.timeoutMs);
  try {
    const resp = await doFetch(url, { method: 'GET', signal: controller.signal });
    return { status: resp.status, text: await resp.text() };
  } catch (err) {
    if (isAbortError(err)) throw new Error(`fetch_timeout:${url}`);
    throw err;
  } finally {
    clearTimeout(t);
  }
}
