/**
 * Seedable pseudo-random generator.
 *
 * Uniform values come from mulberry32; normal values use the Box–Muller
 * transform, caching the second value of each pair.
 */
export interface Rng {
  /** Uniform value in [0, 1) */
  next(): number;
  /** Standard normal value */
  normal(): number;
}

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  let spare: number | null = null;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const normal = (): number => {
    if (spare !== null) {
      const value = spare;
      spare = null;
      return value;
    }
    let u = 0;
    while (u === 0) u = next();
    const v = next();
    const radius = Math.sqrt(-2 * Math.log(u));
    spare = radius * Math.sin(2 * Math.PI * v);
    return radius * Math.cos(2 * Math.PI * v);
  };

  return { next, normal };
}

/**
 * Seed drawn from `Math.random()`, for callers that do not pass one.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}
