import type { ClampRange } from "../types/widgets";

export function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n));
}

export function clampTo(n: number, range: ClampRange): number {
  return clamp(n, range.min, range.max);
}

/** Collapses -0 so renderers and equality checks never see a negative zero. */
export function unsignedZero(n: number): number {
  return n === 0 ? 0 : n;
}
