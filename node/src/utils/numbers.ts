// node/src/utils/numbers.ts

/** Three-decimal rounding used for every reported score. */
export function round3(x: number): number {
  return Math.round(x * 1000) / 1000;
}

export function clamp(x: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, x));
}
