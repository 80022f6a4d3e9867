export type RandomSource = () => number;

export function computeSeed(value: string | number): number {
  if (typeof value === 'number' && Number.isFinite(value) && value !== 0) {
    return Math.trunc(value) >>> 0 || 1;
  }
  const text = String(value);
  let hash = 2166136261;
  for (let index = 0; index < text.length; index += 1) {
    hash ^= text.charCodeAt(index);
    hash = Math.imul(hash, 16777619);
    hash >>>= 0;
  }
  return (hash || 1) >>> 0;
}

// Park-Miller minimal standard generator; returns values in (0, 1).
export function createRng(seed: number): RandomSource {
  let state = Math.trunc(seed) % 2147483647;
  if (state <= 0) {
    state += 2147483646;
  }
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}

export function pickIndex(length: number, random: RandomSource): number {
  const index = Math.floor(random() * length);
  return Math.min(Math.max(index, 0), length - 1);
}
