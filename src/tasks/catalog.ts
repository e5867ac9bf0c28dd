import path from 'path';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { knownCheckSchema } from '../checks/descriptors.js';
import { attachmentListSchema } from '../schemas.js';

const paramValueSchema = z.union([z.string(), z.number(), z.boolean()]);

// Descriptors stay exactly as the catalog writes them; each must still be one the check engine
// understands.
const catalogCheckSchema = z.unknown().superRefine((raw, ctx) => {
  const parsed = knownCheckSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    ctx.addIssue({ code: 'custom', message: `${issue?.path.join('.') || 'check'}: ${issue?.message ?? 'invalid check'}` });
  }
});

export const roundTemplateSchema = z.object({
  brief: z.string().min(1),
  params: z.record(z.string().regex(/^\w+$/), z.array(paramValueSchema).min(1)).default({}),
  attachments: attachmentListSchema.default([]),
  checks: z.array(catalogCheckSchema).min(1),
});

export const templateSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*[a-z0-9]$/),
  name: z.string().min(1),
  critical_checks: z.array(z.string().min(1)).optional(),
  rounds: z.record(z.string().regex(/^[1-9]\d*$/), roundTemplateSchema),
});

export const catalogSchema = z
  .object({ templates: z.array(templateSchema).min(1) })
  .superRefine((c, ctx) => {
    const seen = new Set<string>();
    c.templates.forEach((t, i) => {
      if (seen.has(t.id)) ctx.addIssue({ code: 'custom', message: `duplicate template id ${t.id}`, path: ['templates', i, 'id'] });
      seen.add(t.id);
    });
  });

export type Catalog = z.infer<typeof catalogSchema>;
export type Template = z.infer<typeof templateSchema>;
export type RoundTemplate = z.infer<typeof roundTemplateSchema>;

export function defaultCatalogPath(): string {
  return process.env.CATALOG_PATH ?? path.resolve(process.cwd(), 'catalog/templates.json');
}

export function parseCatalog(raw: unknown): Catalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join('.') : '(root)';
    throw new Error(`catalog_invalid:${where}:${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export async function loadCatalog(file = defaultCatalogPath()): Promise<Catalog> {
  const text = await readFile(file, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`catalog_invalid_json:${file}`, { cause: err });
  }
  return parseCatalog(raw);
}

export function findTemplate(catalog: Catalog, id: string): Template | undefined {
  return catalog.templates.find((t) => t.id === id);
}
