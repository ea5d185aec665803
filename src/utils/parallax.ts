import type {
  ParallaxInput,
  ParallaxOutput,
  ParallaxScaleInput,
  ParallaxScaleOutput,
  ScrollState,
  TransformBounds,
} from "../types/widgets";
import { clampTo, unsignedZero } from "./math";

/* Fixed policy: layers never invert or collapse, opacity stays a valid alpha. */
export const DEFAULT_BOUNDS: TransformBounds = {
  opacity: { min: 0, max: 1 },
  scale: { min: 0.5, max: 1.5 },
};

/** Signed distance between the scroll position and the layer's page; 0 when centred. */
export function distanceFromCenter({ pageOffset, pageIndex }: ScrollState): number {
  return pageOffset - pageIndex;
}

function horizontalOffsetFor(distance: number, viewportWidth: number, speed: number): number {
  return unsignedZero(-distance * viewportWidth * speed);
}

/**
 * Translation and fade for a parallax layer.
 *
 * speed 0 keeps the layer static, 0.5 moves it at half the scroll rate,
 * 1 tracks the scroll and values above 1 push it ahead as a foreground layer.
 * `bounds.opacity` only applies while fading; with fade off opacity is always 1.
 */
export function computeParallax(
  input: ParallaxInput,
  bounds: TransformBounds = DEFAULT_BOUNDS,
): ParallaxOutput {
  const distance = distanceFromCenter(input);
  const opacity = input.fadeEnabled ? clampTo(1 - Math.abs(distance), bounds.opacity) : 1;
  return {
    horizontalOffset: horizontalOffsetFor(distance, input.viewportWidth, input.speed),
    opacity,
    verticalOffset: input.verticalOffset,
  };
}

/** Translation plus a zoom that peaks when the layer's page is centred. */
export function computeParallaxScale(
  input: ParallaxScaleInput,
  bounds: TransformBounds = DEFAULT_BOUNDS,
): ParallaxScaleOutput {
  const distance = distanceFromCenter(input);
  const rawScale = 1 + input.scaleSpeed * (1 - Math.abs(distance));
  return {
    horizontalOffset: horizontalOffsetFor(distance, input.viewportWidth, input.speed),
    scale: clampTo(rawScale, bounds.scale),
    verticalOffset: input.verticalOffset,
  };
}
