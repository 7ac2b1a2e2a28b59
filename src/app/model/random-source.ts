/** Uniform float in [0, 1). */
export type RandomSource = () => number;

export const systemRandom: RandomSource = () => Math.random();

export function seedToUint32(seed: number | string): number {
  if (typeof seed === 'number') {
    return (seed >>> 0) || 1;
  }
  // FNV-1a
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return (h >>> 0) || 1;
}

/** Mulberry32 stream; the same seed always yields the same sequence. */
export function seededRandom(seed: number | string): RandomSource {
  let state = seedToUint32(seed);
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
