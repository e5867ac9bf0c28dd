export function argValue(name: string): string | undefined {
  const idx = process.argv.indexOf(name);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

export function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

export function mustEnv(name: string): string {
  const v = String(process.env[name] ?? '').trim();
  if (!v) throw new Error(`missing_${name}`);
  return v;
}

export function intArg(name: string): number | undefined {
  const raw = argValue(name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new Error(`invalid_${name.replace(/^-+/, '')}:${raw}`);
  return n;
}
