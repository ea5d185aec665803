import type { OptionVisualState } from "../types/widgets";

export const OPTION_VISUAL_STATES: readonly OptionVisualState[] = [
  "neutral",
  "selected",
  "revealedCorrect",
  "revealedIncorrectSelected",
];

/**
 * Visual state of an answer option.
 * Until the answer is revealed every unselected option looks neutral,
 * including the correct one.
 */
export function classifyOption(
  isSelected: boolean,
  isCorrect: boolean,
  isRevealed: boolean,
): OptionVisualState {
  if (isRevealed) {
    if (isCorrect) return "revealedCorrect";
    if (isSelected) return "revealedIncorrectSelected";
    return "neutral";
  }
  return isSelected ? "selected" : "neutral";
}

/** Badge letter for an option: 0 → "A", 1 → "B", … */
export function optionLetter(index: number): string {
  return String.fromCharCode(65 + index);
}
