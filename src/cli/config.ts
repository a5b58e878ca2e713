/**
 * Configuration Management
 *
 * Render defaults for the CLI, read from (lowest to highest precedence):
 * 1. ~/.promptloom/config.json
 * 2. promptloom.config.json in the working directory
 * 3. PROMPTLOOM_* environment variables
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { parseLogLevel } from "../lib/logger.js";
import { ok, err, tryCatch } from "../lib/result.js";

import type { Result } from "../lib/result.js";

export const CONFIG_FILE_NAME = "promptloom.config.json";

/**
 * Configuration schema
 */
export const ConfigSchema = z
  .object({
    missingVariablePolicy: z.enum(["strict", "lenient"]).optional(),
    escapeOutput: z.boolean().optional(),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Where configuration is read from. Tests point these at temp dirs.
 */
export interface ConfigSources {
  cwd?: string;
  home?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Config file candidates, lowest precedence first
 */
export function getConfigPaths(sources: ConfigSources = {}): string[] {
  const home = sources.home ?? homedir();
  const cwd = sources.cwd ?? process.cwd();
  return [join(home, ".promptloom", "config.json"), join(cwd, CONFIG_FILE_NAME)];
}

function readConfigFile(filePath: string): Result<Config, ConfigError> {
  if (!existsSync(filePath)) {
    return ok({});
  }

  const content = tryCatch((): unknown => JSON.parse(readFileSync(filePath, "utf-8")));
  if (!content.success) {
    return err(new ConfigError(`Failed to read config file: ${filePath}`, { filePath, cause: content.error.message }));
  }

  const result = ConfigSchema.safeParse(content.data);
  if (!result.success) {
    return err(new ConfigError(`Invalid config in ${filePath}`, { filePath, issues: result.error.issues }));
  }
  return ok(result.data);
}

function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      return undefined;
  }
}

/**
 * Read overrides from PROMPTLOOM_* variables. Empty variables are ignored.
 */
export function readEnvConfig(env: Record<string, string | undefined>): Result<Config, ConfigError> {
  const config: Config = {};

  const policy = env["PROMPTLOOM_MISSING_VARIABLES"];
  if (policy) {
    if (policy !== "strict" && policy !== "lenient") {
      return err(
        new ConfigError(`Invalid PROMPTLOOM_MISSING_VARIABLES: ${policy}. Use: strict, lenient`, { value: policy })
      );
    }
    config.missingVariablePolicy = policy;
  }

  const escape = env["PROMPTLOOM_ESCAPE_OUTPUT"];
  if (escape) {
    const parsed = parseBoolean(escape);
    if (parsed === undefined) {
      return err(new ConfigError(`Invalid PROMPTLOOM_ESCAPE_OUTPUT: ${escape}. Use: true, false`, { value: escape }));
    }
    config.escapeOutput = parsed;
  }

  const level = env["PROMPTLOOM_LOG_LEVEL"];
  if (level) {
    const parsed = parseLogLevel(level);
    if (parsed === undefined) {
      return err(
        new ConfigError(`Invalid PROMPTLOOM_LOG_LEVEL: ${level}. Use: debug, info, warn, error, silent`, {
          value: level,
        })
      );
    }
    config.logLevel = parsed;
  }

  return ok(config);
}

/**
 * Load configuration from disk and environment
 */
export function loadConfig(sources: ConfigSources = {}): Result<Config, ConfigError> {
  let config: Config = {};

  for (const filePath of getConfigPaths(sources)) {
    const fileConfig = readConfigFile(filePath);
    if (!fileConfig.success) {
      return fileConfig;
    }
    config = { ...config, ...fileConfig.data };
  }

  const envConfig = readEnvConfig(sources.env ?? process.env);
  if (!envConfig.success) {
    return envConfig;
  }
  return ok({ ...config, ...envConfig.data });
}
