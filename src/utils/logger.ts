/**
 * Structured UI logging with deterministic IDs.
 * - JSON-first events written to the console
 * - Deterministic ui_event_id derived from a stable hash of the inputs
 * - Silenced by `logging.enabled: false` in the widget config
 */
import { getWidgetConfig } from "../config/runtime";
import { normalizeErrorMessage } from "./errors";

export type UIEventPayload = Record<string, unknown>;
export type UIEventLevel = "INFO" | "ERROR";

export interface UIEvent {
  ui_event_id: string;
  ts: string;
  level: UIEventLevel;
  service: "quiz-widgets";
  name: string;
  payload: UIEventPayload;
}

/** Simple, deterministic FNV-1a hash to hex (stable across sessions). */
export function fnv1aHex(str: string): string {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h += (h << 1) + (h << 4) + (h << 7) + (h << 8) + (h << 24);
  }
  return (h >>> 0).toString(16).padStart(8, "0");
}

/** Build a deterministic id from event name + salient fields. */
export function deterministicId(name: string, payload: UIEventPayload): string {
  const key = JSON.stringify({
    name,
    id: payload.id ?? null,
    index: payload.index ?? null,
    state: payload.state ?? null,
    action: payload.action ?? null,
  });
  return `${fnv1aHex(name)}_${fnv1aHex(key)}`;
}

function emit(level: UIEventLevel, name: string, payload: UIEventPayload): string {
  const event: UIEvent = {
    ui_event_id: deterministicId(name, payload),
    ts: new Date().toISOString(),
    level,
    service: "quiz-widgets",
    name,
    payload,
  };
  if (getWidgetConfig().logging.enabled) {
    if (level === "ERROR") {
      // eslint-disable-next-line no-console
      console.error("[ui.event]", event);
    } else {
      // eslint-disable-next-line no-console
      console.log("[ui.event]", event);
    }
  }
  return event.ui_event_id;
}

export function logEvent(name: string, payload: UIEventPayload = {}): string {
  return emit("INFO", name, payload);
}

export function logError(name: string, err: unknown, payload: UIEventPayload = {}): string {
  return emit("ERROR", name, { ...payload, error: normalizeErrorMessage(err) });
}
