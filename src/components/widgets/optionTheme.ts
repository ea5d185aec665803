import type { OptionVisualState } from "../../types/widgets";

export interface OptionStyle {
  /** Animated fill colour. */
  background: string;
  /** Animated border colour. */
  border: string;
  /** Tailwind classes for the label. */
  text: string;
}

/** Colour table for each option state, the renderer's half of classifyOption(). */
export const optionTheme: Record<OptionVisualState, OptionStyle> = {
  neutral: {
    background: "rgba(255, 255, 255, 0.04)",
    border: "rgba(255, 255, 255, 0.3)",
    text: "text-slate-100",
  },
  selected: {
    background: "rgba(0, 255, 255, 0.12)",
    border: "rgba(0, 255, 255, 1)",
    text: "text-slate-100",
  },
  revealedCorrect: {
    background: "rgba(105, 240, 174, 0.18)",
    border: "rgba(105, 240, 174, 1)",
    text: "text-slate-100 font-medium",
  },
  revealedIncorrectSelected: {
    background: "rgba(255, 82, 82, 0.16)",
    border: "rgba(255, 82, 82, 1)",
    text: "text-slate-100",
  },
};
