import { z } from "zod";

const ordered = (r: { min: number; max: number }) => r.min <= r.max;
const ORDER_MESSAGE = { message: "min must not exceed max" };

// Opacity is an alpha: both ends inside [0, 1]
export const OpacityRange = z
  .object({
    min: z.number().finite().min(0),
    max: z.number().finite().max(1),
  })
  .refine(ordered, ORDER_MESSAGE);

// Scale floor stays positive so a layer never collapses or flips
export const ScaleRange = z
  .object({
    min: z.number().finite().positive(),
    max: z.number().finite(),
  })
  .refine(ordered, ORDER_MESSAGE);

export const Bounds = z.object({
  opacity: OpacityRange.default({ min: 0, max: 1 }),
  scale: ScaleRange.default({ min: 0.5, max: 1.5 }),
});

// Fallbacks for layer props the host screen leaves out
export const ParallaxDefaults = z.object({
  speed: z.number().finite().default(1),
  scaleSpeed: z.number().finite().default(0.2),
});

export const MotionTimings = z.object({
  optionMs: z.number().int().nonnegative().default(220),
  progressMs: z.number().int().nonnegative().default(260),
});

export const Logging = z.object({
  enabled: z.boolean().default(true),
});

export const WidgetConfig = z.object({
  bounds: Bounds.default({}),
  parallax: ParallaxDefaults.default({}),
  motion: MotionTimings.default({}),
  logging: Logging.default({}),
});
export type WidgetConfig = z.infer<typeof WidgetConfig>;
export type WidgetConfigInput = z.input<typeof WidgetConfig>;
