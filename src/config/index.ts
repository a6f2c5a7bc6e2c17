/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool, maybeEnv, type Env } from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError, requireEnv, optionalEnv, optionalEnvBool, maybeEnv, type Env } from "./env.js";

const ENVIRONMENTS: ReadonlySet<string> = new Set(["development", "production", "test"]);
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode (forces LOG_LEVEL=debug) */
  readonly debug: boolean;
  readonly logLevel: LogLevel;
  /** Optional file that log lines are appended to */
  readonly logFile?: string;
  /** Base path used when no --target is given */
  readonly defaultTarget: string;
  /** Organization named in generated documents */
  readonly organizationName: string;
  /** Support address printed in policy and notification text */
  readonly supportEmail: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load and validate application configuration.
 * Fails fast on values that cannot be used.
 */
export function loadAppConfig(env: Env = process.env): Readonly<AppConfig> {
  const nodeEnv = optionalEnv("NODE_ENV", "development", env);
  if (!ENVIRONMENTS.has(nodeEnv)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${nodeEnv}. Must be ${[...ENVIRONMENTS].join(", ")}.`
    );
  }

  const debug = optionalEnvBool("DEBUG", false, env);
  const rawLevel = debug ? "debug" : optionalEnv("LOG_LEVEL", "info", env).toLowerCase();
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${rawLevel}. Must be debug, info, warn, or error.`
    );
  }

  const supportEmail = optionalEnv("SUPPORT_EMAIL", "data-support@example.org", env);
  if (!supportEmail.includes("@")) {
    throw new ConfigError(`Invalid SUPPORT_EMAIL: ${supportEmail}`);
  }

  return Object.freeze({
    env: nodeEnv,
    debug,
    logLevel: rawLevel,
    logFile: maybeEnv("LOG_FILE", env),
    defaultTarget: optionalEnv("RESEARCH_DRIVE_ROOT", process.cwd(), env),
    organizationName: optionalEnv("ORGANIZATION_NAME", "Research Drive", env),
    supportEmail,
  });
}
