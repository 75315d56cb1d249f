/**
 * Configuration for the levelog command.
 *
 * Resolves the default log level from the environment or from
 * ~/.levelog/config.yaml. The logger itself never reads configuration; it is
 * handed the resolved string.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { InvalidConfigurationError } from "../logging/errors.js";

const STATE_DIRNAME = ".levelog";
const CONFIG_FILENAME = "config.yaml";

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LEVELOG_HOME?.trim();
  if (override) {
    if (override.includes("..")) {
      throw new Error(
        `Invalid LEVELOG_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!override.startsWith("/") && !override.startsWith("~")) {
      throw new Error(
        `Invalid LEVELOG_HOME path '${override}': path must be absolute (start with '/' or '~')`,
      );
    }
    return path.resolve(override);
  }
  return os.homedir();
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LEVELOG_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

export function resolveConfigPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, CONFIG_FILENAME);
}

export interface LevelogConfig {
  /** Default log level for contexts that never call configure(). */
  level?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load config.yaml from the state directory.
 *
 * Returns undefined when the file is missing or empty.
 *
 * @throws InvalidConfigurationError if the file is not a mapping or `level`
 *   is not a string.
 */
export function loadConfig(stateDir?: string): LevelogConfig | undefined {
  const configPath = resolveConfigPath(stateDir ?? resolveStateDir());
  if (!fs.existsSync(configPath)) {
    return undefined;
  }

  const parsed: unknown = parseYaml(fs.readFileSync(configPath, "utf-8"));
  if (parsed === null || parsed === undefined) {
    return undefined;
  }
  if (!isRecord(parsed)) {
    throw new InvalidConfigurationError(`Invalid config at ${configPath}: expected a mapping`);
  }

  const { level } = parsed;
  if (level === undefined || level === null) {
    return {};
  }
  if (typeof level !== "string") {
    throw new InvalidConfigurationError(
      `Invalid config at ${configPath}: 'level' must be a string`,
      String(level),
    );
  }
  return { level };
}

/**
 * Default log level: LEVELOG_LEVEL > config.yaml `level` > none.
 *
 * The value is returned as written; the logger validates it.
 */
export function resolveDefaultLevel(
  env: NodeJS.ProcessEnv = process.env,
  stateDir?: string,
): string | undefined {
  const fromEnv = env.LEVELOG_LEVEL?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  return loadConfig(stateDir ?? resolveStateDir(env))?.level;
}
