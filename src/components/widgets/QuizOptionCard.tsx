import React, { useMemo } from "react";
import clsx from "clsx";
import { motion } from "framer-motion";
import { getWidgetConfig } from "../../config/runtime";
import { classifyOption, optionLetter } from "../../utils/quiz";
import { logError, logEvent } from "../../utils/logger";
import { optionVariants } from "./motionVariants";
import { optionTheme } from "./optionTheme";

export interface QuizOptionCardProps {
  label: string;
  /** Position in the question's option list; drives the letter badge. */
  index: number;
  isSelected: boolean;
  isCorrect: boolean;
  /**
   * Whether correctness has been disclosed. Until then the correct
   * option looks like any other.
   */
  isRevealed: boolean;
  onSelect: (index: number) => void;
  className?: string;
}

/** Single answer option with a letter badge and animated state colours. */
const QuizOptionCard: React.FC<QuizOptionCardProps> = ({
  label,
  index,
  isSelected,
  isCorrect,
  isRevealed,
  onSelect,
  className,
}) => {
  const { optionMs } = getWidgetConfig().motion;
  const state = classifyOption(isSelected, isCorrect, isRevealed);
  const variants = useMemo(() => optionVariants(optionMs), [optionMs]);

  const handleClick = () => {
    logEvent("quiz.option.select", { index, state, action: "select" });
    try {
      onSelect(index);
    } catch (err) {
      logError("quiz.option.select_failed", err, { index });
      throw err;
    }
  };

  return (
    <motion.button
      type="button"
      data-state={state}
      aria-pressed={isSelected}
      variants={variants}
      initial={false}
      animate={state}
      onClick={handleClick}
      className={clsx(
        "my-1.5 flex w-full items-center gap-3.5 rounded-[18px] border px-4 py-3.5 text-left shadow-lg",
        "focus:outline-none focus:ring-2 focus:ring-cyan-400",
        className,
      )}
    >
      <span
        aria-hidden="true"
        className="inline-flex h-[30px] w-[30px] shrink-0 items-center justify-center rounded-full bg-white/10 text-sm font-semibold"
      >
        {optionLetter(index)}
      </span>
      <span className={clsx("flex-1 leading-tight", optionTheme[state].text)}>{label}</span>
    </motion.button>
  );
};

export default QuizOptionCard;
