/**
 * Logging subsystem for levelog.
 *
 * Level-filtered, per-context thresholds, one formatted line per message on
 * stdout.
 */
export { LevelFilteredLogger, createLogger } from "./logger.js";
export type { LoggerOptions } from "./logger.js";
export {
  SEVERITIES,
  SEVERITY_RANK,
  Severity,
  isSeverity,
  normalizeSeverity,
  passesThreshold,
} from "./levels.js";
export { InvalidConfigurationError } from "./errors.js";
export { ExecutionContext, currentContext, rootThreadName, runInContext } from "./context.js";
export { formatEntry, formatTimestamp } from "./format.js";
export type { LogEntry } from "./format.js";
export {
  captureCallSites,
  captureCallerTag,
  findCallerFrame,
  formatCallerTag,
  parseStackFrame,
} from "./stack.js";
export type { CallerFrame } from "./stack.js";
