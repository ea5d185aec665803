// src/components/widgets/motionVariants.ts
import type { Transition, Variants } from "framer-motion";
import { OPTION_VISUAL_STATES } from "../../utils/quiz";
import { optionTheme } from "./optionTheme";

// cubic-bezier equivalents of easeInOutCubic / easeOutCubic
const EASE_IN_OUT_CUBIC: [number, number, number, number] = [0.65, 0, 0.35, 1];
const EASE_OUT_CUBIC: [number, number, number, number] = [0.33, 1, 0.68, 1];

// OPTION CARD: colour cross-fade between visual states
export function optionVariants(durationMs: number): Variants {
  const transition: Transition = { duration: durationMs / 1000, ease: EASE_IN_OUT_CUBIC };
  return Object.fromEntries(
    OPTION_VISUAL_STATES.map((state) => [
      state,
      {
        backgroundColor: optionTheme[state].background,
        borderColor: optionTheme[state].border,
        transition,
      },
    ]),
  );
}

// PROGRESS BAR: fill grows toward the new ratio
export function progressTransition(durationMs: number): Transition {
  return { duration: durationMs / 1000, ease: EASE_OUT_CUBIC };
}
