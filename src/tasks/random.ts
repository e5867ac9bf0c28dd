import { createHash } from 'crypto';

/**
 * Small deterministic PRNG (sfc32) seeded from the SHA-256 of a string.
 * Same seed, same sequence, on every platform.
 */
export class SeededRandom {
  private a: number;
  private b: number;
  private c: number;
  private d: number;

  constructor(seed: string) {
    const digest = createHash('sha256').update(seed).digest();
    this.a = digest.readUInt32BE(0);
    this.b = digest.readUInt32BE(4);
    this.c = digest.readUInt32BE(8);
    this.d = digest.readUInt32BE(12);
    // Warm up so closely related seeds diverge.
    for (let i = 0; i < 12; i++) this.nextUint32();
  }

  nextUint32(): number {
    const t = (((this.a + this.b) >>> 0) + this.d) >>> 0;
    this.d = (this.d + 1) >>> 0;
    this.a = this.b ^ (this.b >>> 9);
    this.b = (this.c + (this.c << 3)) >>> 0;
    this.c = ((this.c << 21) | (this.c >>> 11)) >>> 0;
    this.c = (this.c + t) >>> 0;
    return t;
  }

  /** Float in [0, 1). */
  next(): number {
    return this.nextUint32() / 4294967296;
  }

  int(maxExclusive: number): number {
    if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) throw new Error(`invalid_range:${maxExclusive}`);
    return Math.floor(this.next() * maxExclusive);
  }

  choice<T>(items: readonly T[]): T {
    if (!items.length) throw new Error('empty_choice');
    const picked = items[this.int(items.length)];
    if (picked === undefined) throw new Error('empty_choice');
    return picked;
  }
}

export function seededRandom(seed: string): SeededRandom {
  return new SeededRandom(seed);
}
