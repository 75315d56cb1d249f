/**
 * CLI program definition for levelog.
 *
 * Uses Commander to define the command structure.
 */
import { Command } from "commander";
import { resolveDefaultLevel } from "../config/index.js";
import { runInContext } from "../logging/context.js";
import { InvalidConfigurationError } from "../logging/errors.js";
import { SEVERITIES, normalizeSeverity } from "../logging/levels.js";
import { createLogger } from "../logging/logger.js";
import { VERSION } from "../version.js";

export interface CliOptions {
  level?: string;
  defaultLevel?: string;
  thread?: string;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("levelog")
    .description("Write a level-filtered, timestamped log line to stdout")
    .version(VERSION)
    .argument("<severity>", "message severity: debug, info, warn or error")
    .argument("[message...]", "message text")
    .option("--level <level>", "threshold to configure before logging")
    .option(
      "--default-level <level>",
      "default threshold (overrides LEVELOG_LEVEL and config.yaml)",
    )
    .option("--thread <name>", "log from a context with this name")
    .action((severity: string, message: string[], opts: CliOptions) => {
      handleCli(severity, message, opts);
    });

  program
    .command("levels")
    .description("list severities from least to most important")
    .action(() => {
      printLevels();
    });

  return program;
}

export function printLevels(): void {
  for (const severity of SEVERITIES) {
    console.log(severity);
  }
}

export function handleCli(
  severity: string,
  words: string[],
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  /** Override the state dir holding config.yaml, for testing. */
  stateDir?: string,
): void {
  const defaultLevel = opts.defaultLevel ?? resolveDefaultLevel(env, stateDir);
  const logger = createLogger({ defaultLevel });
  const target = normalizeSeverity(severity);
  const message = words.join(" ");

  const emit = (): void => {
    if (opts.level !== undefined) {
      logger.configure(opts.level);
    }
    logger.log(target, message);
  };

  if (opts.thread) {
    runInContext(opts.thread, emit);
  } else {
    emit();
  }
}

/**
 * Text the entry point prints for a failure: the message alone for a
 * configuration mistake, the stack for anything else.
 */
export function formatCliError(err: unknown): string {
  if (err instanceof InvalidConfigurationError) {
    return err.message;
  }
  return err instanceof Error ? (err.stack ?? err.message) : String(err);
}
