import { randomBytes } from "node:crypto";

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const cryptoRandom: RandomSource = () => randomBytes(4).readUInt32BE(0) / 0x100000000;

/** mulberry32; reproducible runs for tests and `--seed`. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  };
}

export function randomIndex(random: RandomSource, size: number): number {
  return Math.min(size - 1, Math.floor(random() * size));
}

export function shuffle<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}
