export { default as ParallaxLayer } from "./components/widgets/ParallaxLayer";
export type { ParallaxLayerProps } from "./components/widgets/ParallaxLayer";
export { default as ParallaxScaleLayer } from "./components/widgets/ParallaxScaleLayer";
export type { ParallaxScaleLayerProps } from "./components/widgets/ParallaxScaleLayer";
export { default as QuizOptionCard } from "./components/widgets/QuizOptionCard";
export type { QuizOptionCardProps } from "./components/widgets/QuizOptionCard";
export { default as QuizProgressBar } from "./components/widgets/QuizProgressBar";
export type { QuizProgressBarProps } from "./components/widgets/QuizProgressBar";
export { optionTheme } from "./components/widgets/optionTheme";
export type { OptionStyle } from "./components/widgets/optionTheme";
export { optionVariants, progressTransition } from "./components/widgets/motionVariants";

export { default as useViewportWidth } from "./hooks/useViewportWidth";

export {
  DEFAULT_BOUNDS,
  computeParallax,
  computeParallaxScale,
  distanceFromCenter,
} from "./utils/parallax";
export { computeProgress, formatProgressLabel } from "./utils/progress";
export { OPTION_VISUAL_STATES, classifyOption, optionLetter } from "./utils/quiz";
export { clamp } from "./utils/math";
export { WidgetConfigError, normalizeErrorMessage } from "./utils/errors";
export { logEvent, logError } from "./utils/logger";
export type { UIEvent, UIEventPayload } from "./utils/logger";

export {
  configureWidgets,
  getWidgetConfig,
  resetWidgetConfig,
  resolveWidgetConfig,
} from "./config/runtime";
export type { WidgetConfig, WidgetConfigInput } from "./config/schema";

export type * from "./types/widgets";
