import { z } from 'zod';
import { postJson, type FetchLike } from '../http.js';
import { fileMapSchema } from '../schemas.js';
import type { Attachment } from '../types.js';
import { envNumber, truncate } from '../utils.js';

export type FileMap = Record<string, string>;

export interface CodeSynthesizer {
  generate(input: { brief: string; checks: unknown[]; attachments: Attachment[]; taskId: string }): Promise<FileMap>;
  revise(input: { brief: string; checks: unknown[]; taskId: string; existingFiles: FileMap }): Promise<FileMap>;
}

export type PublishResult =
  | { success: true; repoUrl: string; commitSha: string; pagesUrl: string }
  | { success: false; error: string };

export interface Publisher {
  publish(input: { files: FileMap; taskId: string; round: number }): Promise<PublishResult>;
}

export interface SecretVerifier {
  verify(email: string, secret: string): Promise<boolean>;
}

// BUILD_SHARED_SECRET unset means open mode: any secret passes.
export class SharedSecretVerifier implements SecretVerifier {
  constructor(private readonly expected: string | undefined = process.env.BUILD_SHARED_SECRET) {}

  async verify(_email: string, secret: string): Promise<boolean> {
    if (!this.expected) return true;
    return secret === this.expected;
  }
}

function requireUrl(name: string, value: string | undefined): string {
  const v = String(value ?? '').trim();
  if (!v) throw new Error(`missing_${name}`);
  return v.replace(/\/+$/, '');
}

async function postForJson(url: string, body: unknown, timeoutMs: number, fetchImpl: FetchLike | undefined, tag: string) {
  const out = await postJson(url, body, { timeoutMs, fetchImpl });
  if (out.kind === 'timeout') throw new Error(`${tag}_timeout`);
  if (out.kind === 'error') throw new Error(`${tag}_request_failed:${out.message}`);
  if (out.status !== 200) throw new Error(`${tag}_http_${out.status}:${truncate(out.text, 200)}`);
  try {
    const parsed: unknown = JSON.parse(out.text);
    return parsed;
  } catch (err) {
    throw new Error(`${tag}_invalid_json`, { cause: err });
  }
}

const synthResponseSchema = z.object({ files: fileMapSchema });

export class HttpCodeSynthesizer implements CodeSynthesizer {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: FetchLike;

  constructor(opts: { baseUrl?: string; timeoutMs?: number; fetchImpl?: FetchLike } = {}) {
    this.baseUrl = requireUrl('SYNTH_URL', opts.baseUrl ?? process.env.SYNTH_URL);
    this.timeoutMs = opts.timeoutMs ?? envNumber('SYNTH_TIMEOUT_MS', 120_000);
    this.fetchImpl = opts.fetchImpl;
  }

  private async call(path: string, body: unknown): Promise<FileMap> {
    const raw = await postForJson(`${this.baseUrl}${path}`, body, this.timeoutMs, this.fetchImpl, 'synth');
    const parsed = synthResponseSchema.safeParse(raw);
    if (!parsed.success) throw new Error('synth_invalid_response');
    return parsed.data.files;
  }

  generate(input: { brief: string; checks: unknown[]; attachments: Attachment[]; taskId: string }): Promise<FileMap> {
    return this.call('/generate', { brief: input.brief, checks: input.checks, attachments: input.attachments, task_id: input.taskId });
  }

  revise(input: { brief: string; checks: unknown[]; taskId: string; existingFiles: FileMap }): Promise<FileMap> {
    return this.call('/revise', { brief: input.brief, checks: input.checks, task_id: input.taskId, existing_files: input.existingFiles });
  }
}

const publishResponseSchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), repo_url: z.string().min(1), commit_sha: z.string().min(1), pages_url: z.string().min(1) }),
  z.object({ success: z.literal(false), error: z.string().default('publish failed') }),
]);

export class HttpPublisher implements Publisher {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: FetchLike;

  constructor(opts: { url?: string; timeoutMs?: number; fetchImpl?: FetchLike } = {}) {
    this.url = requireUrl('PUBLISH_URL', opts.url ?? process.env.PUBLISH_URL);
    this.timeoutMs = opts.timeoutMs ?? envNumber('PUBLISH_TIMEOUT_MS', 120_000);
    this.fetchImpl = opts.fetchImpl;
  }

  async publish(input: { files: FileMap; taskId: string; round: number }): Promise<PublishResult> {
    const raw = await postForJson(this.url, { files: input.files, task_id: input.taskId, round: input.round }, this.timeoutMs, this.fetchImpl, 'publish');
    const parsed = publishResponseSchema.safeParse(raw);
    if (!parsed.success) return { success: false, error: 'publish_invalid_response' };
    const r = parsed.data;
    return r.success
      ? { success: true, repoUrl: r.repo_url, commitSha: r.commit_sha, pagesUrl: r.pages_url }
      : { success: false, error: r.error };
  }
}
