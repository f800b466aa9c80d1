import { createHash, randomBytes } from "node:crypto";

export type RandomSource = () => number;

function seedFromString(seed: string): number {
  return createHash("sha256").update(seed).digest().readUInt32LE(0);
}

/**
 * mulberry32: small, fast, good enough for shuffling a closet
 */
function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Returns a generator in [0, 1). The same seed always gives the same sequence.
 */
export function createRandom(seed?: string | null): RandomSource {
  const numericSeed =
    seed === undefined || seed === null
      ? randomBytes(4).readUInt32LE(0)
      : seedFromString(seed);
  return mulberry32(numericSeed);
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(list: readonly T[], random: RandomSource): T[] {
  const result = [...list];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
