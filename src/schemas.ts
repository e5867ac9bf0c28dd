import { z } from 'zod';

export const attachmentSchema = z.object({
  name: z.string().min(1).max(255),
  type: z.string().min(1).max(120).optional(),
  url: z.string().min(1).optional(),
  content: z.string().optional(),
});

export const attachmentListSchema = z.array(attachmentSchema).max(50);

export const checkListSchema = z.array(z.unknown());

// filename -> file content
export const fileMapSchema = z.record(z.string().min(1), z.string());

const httpUrl = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'must be an http(s) url' });

// Body a participant (or a build worker) posts back once a round is deployed.
export const submissionBodySchema = z.object({
  email: z.string().email(),
  task: z.string().min(1).max(200),
  round: z.number().int().min(1),
  nonce: z.string().min(1).max(200),
  repo_url: z.string().min(1).max(2000),
  commit_sha: z.string().min(1).max(200),
  pages_url: z.string().min(1).max(2000),
});

export type SubmissionBody = z.infer<typeof submissionBodySchema>;

// Incoming task request for the build/revise direction. Checks stay opaque here; the builder
// forwards them to the synthesizer as-is.
export const buildRequestSchema = z.object({
  email: z.string().email(),
  secret: z.string().min(8).max(500),
  task: z.string().min(3).max(200),
  round: z.number().int().min(1),
  nonce: z.string().min(1).max(200),
  brief: z.string().min(10).max(20_000),
  checks: z.array(z.unknown()).min(1).max(100),
  evaluation_url: httpUrl,
  attachments: attachmentListSchema.default([]),
});

export type BuildRequest = z.infer<typeof buildRequestSchema>;

export const participantRowSchema = z.object({
  timestamp: z.string().default(''),
  email: z.string().trim().email(),
  endpoint: httpUrl,
  secret: z.string().min(1),
});

export type Participant = z.infer<typeof participantRowSchema>;

export const errorEnvelopeSchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});
