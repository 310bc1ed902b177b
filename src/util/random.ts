export type RandomSource = () => number;

/** Deterministic PRNG (mulberry32) for reproducible shuffles. */
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pickIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/** Fisher-Yates, returns a new array. */
export function shuffle<T>(values: readonly T[], random: RandomSource): T[] {
  const out = [...values];
  for (let i = out.length - 1; i > 0; i--) {
    const j = pickIndex(i + 1, random);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function sampleWithoutReplacement<T>(values: readonly T[], count: number, random: RandomSource): T[] {
  const pool = [...values];
  const picked: T[] = [];
  while (picked.length < count && pool.length > 0) {
    const [value] = pool.splice(pickIndex(pool.length, random), 1);
    picked.push(value);
  }
  return picked;
}
