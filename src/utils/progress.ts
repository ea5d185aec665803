import type { ProgressLabel } from "../types/widgets";
import { clamp } from "./math";

/**
 * Fraction of the bar to fill for a zero-based question index.
 * An empty quiz (total 0) reads as no progress.
 */
export function computeProgress(currentIndex: number, total: number): number {
  if (total === 0) return 0;
  return clamp((currentIndex + 1) / total, 0, 1);
}

export function formatProgressLabel(currentIndex: number, total: number): ProgressLabel {
  const position = currentIndex + 1;
  return {
    title: `Question ${position}`,
    counter: `${position} of ${total}`,
  };
}
