/**
 * Raised when a log level cannot be resolved: an unknown label, no label and
 * no default, or a malformed config file.
 */
export class InvalidConfigurationError extends Error {
  /** The rejected level value, when there was one. */
  readonly level: string | undefined;

  constructor(message: string, level?: string) {
    super(message);
    this.name = "InvalidConfigurationError";
    this.level = level;
  }
}
