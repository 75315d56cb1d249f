/**
 * Level-filtered console logger.
 *
 * Each execution context holds its own threshold. A context with no
 * threshold takes the logger's default on its first emit and keeps it;
 * with no default either, everything is emitted and marked with `*`.
 *
 * Line format:
 *   <timestamp> <thread> <*|empty> <SEVERITY> <[Simple.fn()]:line> <message>
 */
import { fileURLToPath } from "node:url";
import { currentContext, type ExecutionContext } from "./context.js";
import { InvalidConfigurationError } from "./errors.js";
import { formatEntry } from "./format.js";
import { normalizeSeverity, passesThreshold, Severity } from "./levels.js";
import { captureCallerTag, STACK_MODULE_FILE } from "./stack.js";

const COMPONENT_FILES: ReadonlySet<string> = new Set([
  fileURLToPath(import.meta.url),
  STACK_MODULE_FILE,
]);

export interface LoggerOptions {
  /** Threshold a context adopts on its first emit. Case-insensitive. */
  defaultLevel?: string;
}

export class LevelFilteredLogger {
  private readonly thresholds = new WeakMap<ExecutionContext, Severity>();
  readonly defaultLevel: Severity | undefined;

  /** @throws InvalidConfigurationError if `defaultLevel` is not a severity. */
  constructor(options: LoggerOptions = {}) {
    this.defaultLevel =
      options.defaultLevel === undefined ? undefined : normalizeSeverity(options.defaultLevel);
  }

  /**
   * Set the calling context's threshold, falling back to the default level.
   *
   * @throws InvalidConfigurationError for an unknown label, or when no label
   *   is given and there is no default.
   */
  configure(level?: string): Severity {
    const label = level ?? this.defaultLevel;
    if (label === undefined) {
      throw new InvalidConfigurationError(
        "No log level given and no default log level configured",
      );
    }
    const severity = normalizeSeverity(label);
    this.thresholds.set(currentContext(), severity);
    return severity;
  }

  /** The calling context's threshold, if it has one. */
  threshold(): Severity | undefined {
    return this.thresholds.get(currentContext());
  }

  debug(msg: string): void {
    this.write(Severity.DEBUG, msg);
  }

  info(msg: string): void {
    this.write(Severity.INFO, msg);
  }

  warn(msg: string): void {
    this.write(Severity.WARN, msg);
  }

  /** Alias of warn(). */
  warning(msg: string): void {
    this.write(Severity.WARN, msg);
  }

  error(msg: string): void {
    this.write(Severity.ERROR, msg);
  }

  log(severity: Severity, msg: string): void {
    this.write(severity, msg);
  }

  private write(severity: Severity, msg: string): void {
    const context = currentContext();
    let threshold = this.thresholds.get(context);

    if (threshold === undefined && this.defaultLevel !== undefined) {
      threshold = this.configure();
    }

    if (threshold !== undefined && !passesThreshold(severity, threshold)) return;

    const line = formatEntry({
      timestamp: new Date(),
      thread: context.name,
      unfiltered: threshold === undefined,
      severity,
      caller: captureCallerTag(COMPONENT_FILES),
      message: msg,
    });
    console.log(line);
  }
}

/** Create a logger with an optional default level. */
export function createLogger(options: LoggerOptions = {}): LevelFilteredLogger {
  return new LevelFilteredLogger(options);
}
