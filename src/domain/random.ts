import type { Seconds } from "./typedefs.js";

/** Returns a value in [0, 1) */
export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(random: RandomSource, min: Seconds, max: Seconds): Seconds {
  const value = min + random() * (max - min);
  // rounding can land exactly on max for draws just below 1
  return value < max ? value : min;
}
