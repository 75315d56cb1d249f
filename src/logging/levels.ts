/**
 * Severity levels for levelog.
 *
 * Ranked DEBUG < INFO < WARN < ERROR. Filtering always compares ranks,
 * never the label text.
 */
import { InvalidConfigurationError } from "./errors.js";

export const SEVERITIES = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Named severity constants (`Severity.WARN` etc.). */
export const Severity = {
  DEBUG: "DEBUG",
  INFO: "INFO",
  WARN: "WARN",
  ERROR: "ERROR",
} as const satisfies Record<Severity, Severity>;

export const SEVERITY_RANK: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

/**
 * Normalize a case-insensitive label to its canonical severity.
 *
 * @throws InvalidConfigurationError if the label names no severity.
 */
export function normalizeSeverity(label: string): Severity {
  const upper = label.toUpperCase();
  if (!isSeverity(upper)) {
    throw new InvalidConfigurationError(`Invalid log level: ${upper}`, label);
  }
  return upper;
}

/** Whether a message at `severity` passes a `threshold`. */
export function passesThreshold(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}
