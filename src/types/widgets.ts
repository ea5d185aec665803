/** Inclusive range a computed value is clamped into. */
export interface ClampRange {
  min: number;
  max: number;
}

export interface TransformBounds {
  opacity: ClampRange;
  scale: ClampRange;
}

/** Where the scroll controller currently is, relative to one layer's page. */
export interface ScrollState {
  /** Fractional page position, e.g. 0.5 = halfway between page 0 and 1. */
  pageOffset: number;
  /** Page this layer belongs to. */
  pageIndex: number;
}

export interface ParallaxInput extends ScrollState {
  /** Precondition: >= 0. Not validated. */
  viewportWidth: number;
  speed: number;
  verticalOffset: number;
  fadeEnabled: boolean;
}

export interface ParallaxScaleInput extends ScrollState {
  viewportWidth: number;
  speed: number;
  scaleSpeed: number;
  verticalOffset: number;
}

export interface ParallaxOutput {
  horizontalOffset: number;
  opacity: number;
  verticalOffset: number;
}

export interface ParallaxScaleOutput {
  horizontalOffset: number;
  scale: number;
  verticalOffset: number;
}

export type OptionVisualState =
  | "neutral"
  | "selected"
  | "revealedCorrect"
  | "revealedIncorrectSelected";

export interface ProgressLabel {
  title: string;
  counter: string;
}
