import type { Severity } from "./levels.js";

/** One passing message, assembled just before it is written. */
export interface LogEntry {
  timestamp: Date;
  /** Name of the execution context that logged. */
  thread: string;
  /** True when no threshold was active for the context. */
  unfiltered: boolean;
  severity: Severity;
  /** `[Simple.fn()]:line`, or "" when the call site is unknown. */
  caller: string;
  message: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local time as `YYYY-MM-DD HH:mm:ss.SSS`. */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Six space-separated fields. Empty marker and caller fields still take their
 * slot, which leaves two adjacent spaces.
 */
export function formatEntry(entry: LogEntry): string {
  return [
    formatTimestamp(entry.timestamp),
    entry.thread,
    entry.unfiltered ? "*" : "",
    entry.severity,
    entry.caller,
    entry.message,
  ].join(" ");
}
