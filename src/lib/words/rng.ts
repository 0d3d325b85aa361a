export interface Rng {
  // Uniform [0, 1)
  float(): number;
  // Integer in [min, max] inclusive
  int(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
  // True with probability p
  chance(p: number): boolean;
}

// Deterministic PRNG (xorshift32). Not crypto-safe.
export function createRng(seed: number): Rng {
  let x = (seed | 0) || 1;

  const nextU32 = () => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return x >>> 0;
  };

  const float = () => nextU32() / 0x100000000;

  const int = (min: number, max: number) => {
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    if (hi < lo) return lo;
    return lo + Math.floor(float() * (hi - lo + 1));
  };

  const pick = <T>(items: readonly T[]): T => {
    const item = items[int(0, items.length - 1)];
    if (item === undefined) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return item;
  };

  const chance = (p: number) => p > 0 && float() < p;

  return { float, int, pick, chance };
}

export function seedFromTime(now: number = Date.now()): number {
  return (now % 0x7fffffff) | 0;
}

// FNV-1a 32-bit; stable across runs and platforms.
export function hashString(input: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}
