import React from "react";
import clsx from "clsx";
import { motion } from "framer-motion";
import { getWidgetConfig } from "../../config/runtime";
import { computeProgress, formatProgressLabel } from "../../utils/progress";
import { progressTransition } from "./motionVariants";

export interface QuizProgressBarProps {
  /** Zero-based index of the current question. */
  currentIndex: number;
  total: number;
  /** Render "Question N" / "N of M" under the bar. */
  showLabel?: boolean;
  className?: string;
}

/** Slim rounded bar whose fill eases toward the current progress. */
const QuizProgressBar: React.FC<QuizProgressBarProps> = ({
  currentIndex,
  total,
  showLabel = false,
  className,
}) => {
  const { progressMs } = getWidgetConfig().motion;
  const ratio = computeProgress(currentIndex, total);
  const label = formatProgressLabel(currentIndex, total);

  return (
    <div className={clsx("flex flex-col gap-2", className)}>
      <div
        role="progressbar"
        aria-label="Quiz progress"
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={Math.round(ratio * 100)}
        className="h-1.5 overflow-hidden rounded-full bg-white/10"
      >
        <motion.div
          className="h-full bg-gradient-to-r from-cyan-400 to-cyan-400/75"
          initial={{ width: "0%" }}
          animate={{ width: `${ratio * 100}%` }}
          transition={progressTransition(progressMs)}
        />
      </div>
      {showLabel && total > 0 && (
        <div className="flex items-center justify-between text-xs">
          <span className="font-semibold">{label.title}</span>
          <span className="text-slate-100/60">{label.counter}</span>
        </div>
      )}
    </div>
  );
};

export default QuizProgressBar;
