import { z } from 'zod';
import { isRecord } from '../utils.js';

const name = z.string().min(1).max(120).optional();

export const elementExistsSchema = z.object({
  type: z.literal('element_exists'),
  name,
  selector: z.string().min(1),
  min_count: z.number().int().min(0).default(1),
});

export const buttonExistsSchema = z.object({
  type: z.literal('button_exists'),
  name,
  text: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).transform((t) => (Array.isArray(t) ? t : [t])),
});

export const clickInteractionSchema = z.object({
  type: z.literal('click_interaction'),
  name,
  selector: z.string().min(1),
  result: z.string().min(1).default('content_changes'),
});

export const responsiveCheckSchema = z.object({
  type: z.literal('responsive_check'),
  name,
  breakpoints: z.array(z.number().int().positive()).min(1).default([768, 1024]),
});

export const keyboardEventSchema = z.object({
  type: z.literal('keyboard_event'),
  name,
  key: z.string().min(1),
  result: z.string().min(1).default('content_changes'),
});

export const mouseEventSchema = z.object({
  type: z.literal('mouse_event'),
  name,
  action: z.enum(['wheel', 'click']),
  selector: z.string().min(1).optional(),
  result: z.string().min(1).default('content_changes'),
});

export const clickSequenceSchema = z.object({
  type: z.literal('click_sequence'),
  name,
  buttons: z.array(z.string().min(1)).min(1),
  result: z.string().min(1),
});

export const keyboardInputSchema = z.object({
  type: z.literal('keyboard_input'),
  name,
  keys: z.string().min(1),
  result: z.string().min(1),
});

export const knownCheckSchema = z.discriminatedUnion('type', [
  elementExistsSchema,
  buttonExistsSchema,
  clickInteractionSchema,
  responsiveCheckSchema,
  keyboardEventSchema,
  mouseEventSchema,
  clickSequenceSchema,
  keyboardInputSchema,
]);

export type KnownCheck = z.infer<typeof knownCheckSchema>;
export type KnownCheckType = KnownCheck['type'];

// Descriptors we cannot interpret (unsupported type or malformed params) are kept so that the
// engine can report them instead of crashing on them.
export interface UnknownCheck {
  type: 'unknown';
  originalType: string;
  problem: string;
  raw: unknown;
}

export type Check = KnownCheck | UnknownCheck;

export const KNOWN_CHECK_TYPES: readonly KnownCheckType[] = [
  'element_exists',
  'button_exists',
  'click_interaction',
  'responsive_check',
  'keyboard_event',
  'mouse_event',
  'click_sequence',
  'keyboard_input',
];

const knownTypes: ReadonlySet<string> = new Set(KNOWN_CHECK_TYPES);

function isKnownType(t: string): t is KnownCheckType {
  return knownTypes.has(t);
}

export function parseCheck(raw: unknown): Check {
  const type = isRecord(raw) && typeof raw.type === 'string' ? raw.type : '';
  if (!isKnownType(type)) {
    return { type: 'unknown', originalType: type || '(missing)', problem: 'unsupported_type', raw };
  }
  const parsed = knownCheckSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join('.') : type;
    return { type: 'unknown', originalType: type, problem: `invalid_params:${where}`, raw };
  }
  return parsed.data;
}

export function parseChecks(raw: unknown): Check[] {
  if (!Array.isArray(raw)) return [];
  return raw.map(parseCheck);
}

export function isKnownCheck(check: Check): check is KnownCheck {
  return check.type !== 'unknown';
}

function slug(s: string, max = 20) {
  return s.slice(0, max);
}

export function checkName(check: KnownCheck): string {
  if (check.name) return check.name;
  switch (check.type) {
    case 'element_exists':
      return `element_${slug(check.selector)}`;
    case 'button_exists':
      return 'button_exists';
    case 'click_interaction':
      return 'click_interaction';
    case 'responsive_check':
      return 'responsive_design';
    case 'keyboard_event':
      return `keyboard_${slug(check.key)}`;
    case 'mouse_event':
      return `mouse_${check.action}`;
    case 'click_sequence':
      return `click_sequence_${slug(check.buttons.join(''))}`;
    case 'keyboard_input':
      return `keyboard_input_${slug(check.keys)}`;
  }
}
