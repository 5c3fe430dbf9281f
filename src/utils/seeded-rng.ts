export type Rng = () => number;

// FNV-1a
const hashSeed = (seed: string): number => {
  let hash = 2166136261;
  for (let i = 0; i < seed.length; i += 1) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
};

const mulberry32 = (seed: number): Rng => {
  let t = seed;
  return (): number => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const createSeededRng = (...parts: Array<string | number | boolean>): Rng =>
  mulberry32(hashSeed(parts.map((part) => String(part)).join(":")));

/** Fisher-Yates over a copy; the input is left untouched. */
export const seededShuffle = <T>(items: ReadonlyArray<T>, rng: Rng): T[] => {
  const shuffled = items.slice();
  for (let i = shuffled.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    const held = shuffled[i];
    shuffled[i] = shuffled[j];
    shuffled[j] = held;
  }
  return shuffled;
};

export const pickOne = <T>(items: ReadonlyArray<T>, rng: Rng): T => {
  if (items.length === 0) {
    throw new Error("pickOne requires a non-empty list");
  }
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
};
