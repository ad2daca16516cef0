export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  integer(min: number, maxExclusive: number): number;
  normal(mean: number, stdDev: number): number;
}

export interface ClampedDistribution {
  mean: number;
  stdDev: number;
  min: number;
  max: number;
}

/**
 * Independent mulberry32 generator. Each instance owns its state, so two
 * generators never affect each other's sequence.
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  function next(): number {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  function integer(min: number, maxExclusive: number): number {
    return min + Math.floor(next() * (maxExclusive - min));
  }

  // Box-Muller
  function normal(mean: number, stdDev: number): number {
    const u = 1 - next();
    const v = next();
    const z = Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
    return mean + z * stdDev;
  }

  return { next, integer, normal };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function clampedNormal(random: RandomSource, dist: ClampedDistribution): number {
  return clamp(random.normal(dist.mean, dist.stdDev), dist.min, dist.max);
}

/** 32-bit FNV-1a over the UTF-8 bytes of `value`. */
export function stableHash(value: string): number {
  let hash = 0x811c9dc5;
  for (const byte of Buffer.from(value, "utf8")) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
