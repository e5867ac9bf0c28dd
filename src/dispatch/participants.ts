import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { participantRowSchema, type Participant } from '../schemas.js';

// Header: timestamp,email,endpoint,secret. Invalid rows are reported and dropped; a repeated
// email keeps its first row.
export function parseParticipants(csvText: string): Participant[] {
  const records: unknown = parse(csvText, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  if (!Array.isArray(records)) throw new Error('participants_invalid_csv');

  const out: Participant[] = [];
  const seen = new Set<string>();
  records.forEach((row: unknown, i: number) => {
    const parsed = participantRowSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      console.warn(`[participants] skip row=${i + 2} field=${issue?.path.join('.') ?? '?'} reason=${issue?.message ?? 'invalid'}`);
      return;
    }
    const key = parsed.data.email.toLowerCase();
    if (seen.has(key)) {
      console.warn(`[participants] skip row=${i + 2} reason=duplicate_email`);
      return;
    }
    seen.add(key);
    out.push(parsed.data);
  });
  return out;
}

export async function readParticipants(csvPath: string): Promise<Participant[]> {
  return parseParticipants(await readFile(csvPath, 'utf8'));
}
