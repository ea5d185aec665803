import React from "react";
import clsx from "clsx";
import { motion } from "framer-motion";
import useViewportWidth from "../../hooks/useViewportWidth";
import { getWidgetConfig } from "../../config/runtime";
import { computeParallaxScale } from "../../utils/parallax";

export interface ParallaxScaleLayerProps {
  pageOffset: number;
  pageIndex: number;
  speed?: number;
  /** Extra zoom at centre: 0.2 grows the layer 20%. Falls back to `parallax.scaleSpeed`. */
  scaleSpeed?: number;
  verticalOffset?: number;
  viewportWidth?: number;
  className?: string;
  children: React.ReactNode;
}

/** ParallaxLayer variant that zooms in as its page reaches centre. */
const ParallaxScaleLayer: React.FC<ParallaxScaleLayerProps> = ({
  pageOffset,
  pageIndex,
  speed,
  scaleSpeed,
  verticalOffset = 0,
  viewportWidth,
  className,
  children,
}) => {
  const measuredWidth = useViewportWidth();
  const { bounds, parallax } = getWidgetConfig();
  const { horizontalOffset, scale } = computeParallaxScale(
    {
      pageOffset,
      pageIndex,
      viewportWidth: viewportWidth ?? measuredWidth,
      speed: speed ?? parallax.speed,
      scaleSpeed: scaleSpeed ?? parallax.scaleSpeed,
      verticalOffset,
    },
    bounds,
  );

  return (
    <motion.div
      className={clsx("will-change-transform", className)}
      style={{ x: horizontalOffset, y: verticalOffset, scale }}
      data-scale={scale}
    >
      {children}
    </motion.div>
  );
};

export default ParallaxScaleLayer;
