import type { ZodIssue } from "zod";

/** Raised when widget configuration fails validation. */
export class WidgetConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid widget config: ${issues.join("; ")}`);
    this.name = "WidgetConfigError";
    this.issues = issues;
  }
}

/** "bounds.scale: min must not exceed max" */
export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.join(".");
    return `${path || "(root)"}: ${issue.message}`;
  });
}

export function normalizeErrorMessage(raw: unknown): string {
  if (raw instanceof WidgetConfigError) {
    return `${raw.name}: ${raw.issues.join("; ")}`;
  }
  if (raw instanceof Error) {
    return raw.message ? `${raw.name}: ${raw.message}` : raw.name;
  }
  if (raw && typeof raw === "object") {
    const message = pickString(raw, "message");
    if (message) return message;
    return safeJson(raw);
  }
  return String(raw ?? "");
}

// ──────────────────────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────────────────────

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function pickString(obj: object, key: string): string | undefined {
  const v: unknown = Reflect.get(obj, key);
  return typeof v === "string" && v ? v : undefined;
}
