/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

export { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

// Normalization configuration (column aliases, collision policy, diff settings)
export * from "./normalization/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name, used as the log file stem */
  readonly appName: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Directory the CLI writes exports into when no explicit path is given */
  readonly outputDir: string;
}

/**
 * Load application configuration from the environment.
 * Every value has a default; validateConfig() checks the enumerated ones.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "prohibited-substances"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    outputDir: optionalEnv("OUTPUT_DIR", "output"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the enumerated configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!(ENVIRONMENTS as readonly string[]).includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!(LOG_LEVELS as readonly string[]).includes(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }
}
