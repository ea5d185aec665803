import { WidgetConfig, type WidgetConfigInput } from "./schema";
import { WidgetConfigError, formatIssues } from "../utils/errors";

let cached: WidgetConfig | undefined;

/** Validate raw config and fill in defaults. Throws WidgetConfigError listing every issue. */
export function resolveWidgetConfig(raw: unknown): WidgetConfig {
  const parsed = WidgetConfig.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new WidgetConfigError(formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/** Resolve and cache the config the widgets read on every render. */
export function configureWidgets(raw: WidgetConfigInput): WidgetConfig {
  cached = resolveWidgetConfig(raw);
  return cached;
}

/** Current config; the defaults until configureWidgets() has been called. */
export function getWidgetConfig(): WidgetConfig {
  if (!cached) cached = resolveWidgetConfig({});
  return cached;
}

export function resetWidgetConfig(): void {
  cached = undefined;
}
