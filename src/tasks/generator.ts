import type { Attachment } from '../types.js';
import { sha256 } from '../utils.js';
import { findTemplate, type Catalog, type Template } from './catalog.js';
import { seededRandom } from './random.js';

export type GenerationErrorCode = 'template_not_found' | 'round_not_configured';

export class GenerationError extends Error {
  readonly code: GenerationErrorCode;

  constructor(code: GenerationErrorCode, detail: string) {
    super(`${code}:${detail}`);
    this.name = 'GenerationError';
    this.code = code;
  }
}

export class TemplateNotFoundError extends GenerationError {
  readonly templateId: string;

  constructor(templateId: string) {
    super('template_not_found', templateId);
    this.name = 'TemplateNotFoundError';
    this.templateId = templateId;
  }
}

export interface GenerateTaskInput {
  catalog: Catalog;
  round: number;
  email: string;
  hourBucket: string;
  // Required from round 2 on: the template is carried over from it.
  previousTaskId?: string;
}

export interface GeneratedTask {
  templateId: string;
  taskId: string;
  brief: string;
  attachments: Attachment[];
  checks: unknown[];
  criticalChecks?: string[];
}

export function computeTaskId(templateId: string, brief: string, attachments: Attachment[]): string {
  return `${templateId}-${sha256(brief + JSON.stringify(attachments)).slice(0, 5)}`;
}

// '' when the id has no `<template>-<hash>` shape.
export function templateIdFromTaskId(taskId: string): string {
  const cut = taskId.lastIndexOf('-');
  return cut > 0 ? taskId.slice(0, cut) : '';
}

export function generationSeed(email: string, bucket: string) {
  return `${email}-${bucket}`;
}

function pickTemplate(input: GenerateTaskInput, choose: (templates: readonly Template[]) => Template): Template {
  if (input.round === 1) return choose(input.catalog.templates);
  const previous = input.previousTaskId ?? '';
  const id = templateIdFromTaskId(previous);
  const template = id ? findTemplate(input.catalog, id) : undefined;
  if (!template) throw new TemplateNotFoundError(id || '(none)');
  return template;
}

/**
 * Deterministic for a given (email, hour bucket, round, previous task id): the seed only
 * depends on the email and the bucket, and param slots are filled in catalog key order.
 */
export function generateTask(input: GenerateTaskInput): GeneratedTask {
  if (!Number.isInteger(input.round) || input.round < 1) throw new Error(`invalid_round:${input.round}`);
  const rng = seededRandom(generationSeed(input.email, input.hourBucket));
  const template = pickTemplate(input, (ts) => rng.choice(ts));
  const roundTemplate = template.rounds[String(input.round)];
  if (!roundTemplate) throw new GenerationError('round_not_configured', `${template.id}/${input.round}`);

  let brief = roundTemplate.brief;
  for (const [name, values] of Object.entries(roundTemplate.params)) {
    brief = brief.replaceAll(`{${name}}`, String(rng.choice(values)));
  }

  const attachments = structuredClone(roundTemplate.attachments);
  return {
    templateId: template.id,
    taskId: computeTaskId(template.id, brief, attachments),
    brief,
    attachments,
    checks: structuredClone(roundTemplate.checks),
    ...(template.critical_checks ? { criticalChecks: [...template.critical_checks] } : {}),
  };
}
