import React from "react";
import clsx from "clsx";
import { motion } from "framer-motion";
import useViewportWidth from "../../hooks/useViewportWidth";
import { getWidgetConfig } from "../../config/runtime";
import { computeParallax } from "../../utils/parallax";

export interface ParallaxLayerProps {
  /** Scroll position from the pager (0.5 = halfway between page 0 and 1). */
  pageOffset: number;
  /** Page this layer belongs to. */
  pageIndex: number;
  /** Falls back to `parallax.speed` from the widget config. */
  speed?: number;
  verticalOffset?: number;
  /** Fade out as the page moves away from centre. */
  fadeEnabled?: boolean;
  /** Overrides the measured viewport width. */
  viewportWidth?: number;
  className?: string;
  children: React.ReactNode;
}

/**
 * Translates its children horizontally at `speed` times the scroll rate.
 * Layers with different speeds stacked on one page give the depth effect.
 */
const ParallaxLayer: React.FC<ParallaxLayerProps> = ({
  pageOffset,
  pageIndex,
  speed,
  verticalOffset = 0,
  fadeEnabled = false,
  viewportWidth,
  className,
  children,
}) => {
  const measuredWidth = useViewportWidth();
  const { bounds, parallax } = getWidgetConfig();
  const { horizontalOffset, opacity } = computeParallax(
    {
      pageOffset,
      pageIndex,
      viewportWidth: viewportWidth ?? measuredWidth,
      speed: speed ?? parallax.speed,
      verticalOffset,
      fadeEnabled,
    },
    bounds,
  );

  return (
    <motion.div
      className={clsx("will-change-transform", className)}
      style={{ x: horizontalOffset, y: verticalOffset, opacity }}
    >
      {children}
    </motion.div>
  );
};

export default ParallaxLayer;
