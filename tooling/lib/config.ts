/**
 * Configuration loading, path expansion and credential lookup
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse as parseEnv } from "dotenv";
import { ConfigurationError, describeError } from "./errors";
import { DEFAULT_MODEL } from "./llm";
import { Logger, globalLogger } from "./logger";
import { Config } from "./types";
import { isPlainObject, isPositiveInteger } from "./utils";

export const CONFIG_FILE_NAME = "vision.config.json";
export const API_KEY_ENV_VAR = "OPENAI_API_KEY";

export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_OUTPUT_FILE = "2077_future_vision.csv";
export const DEFAULT_BATCH_SIZE = 300;
export const DEFAULT_MAX_ATTEMPTS_PER_ITEM = 5;
export const DEFAULT_PROGRESS_INTERVAL = 10;

/**
 * Keep only well-typed entries of a parsed config file
 */
export function sanitizeConfig(raw: unknown): Config {
  if (!isPlainObject(raw)) {
    return {};
  }

  const config: Config = {};
  const { envSearchPaths, outputFile, batchSize, maxAttemptsPerItem, progressInterval, model } = raw;

  if (Array.isArray(envSearchPaths) && envSearchPaths.every((p): p is string => typeof p === "string")) {
    config.envSearchPaths = envSearchPaths;
  }
  if (typeof outputFile === "string" && outputFile.length > 0) {
    config.outputFile = outputFile;
  }
  // zero is a valid (empty) batch
  if (typeof batchSize === "number" && Number.isInteger(batchSize) && batchSize >= 0) {
    config.batchSize = batchSize;
  }
  if (isPositiveInteger(maxAttemptsPerItem)) {
    config.maxAttemptsPerItem = maxAttemptsPerItem;
  }
  if (isPositiveInteger(progressInterval)) {
    config.progressInterval = progressInterval;
  }
  if (typeof model === "string" && model.length > 0) {
    config.model = model;
  }

  return config;
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;
  private logger: Logger;

  constructor(
    projectRoot: string,
    configPath: string = join(projectRoot, CONFIG_FILE_NAME),
    logger: Logger = globalLogger
  ) {
    this.projectRoot = projectRoot;
    this.logger = logger;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf8"));
    } catch (error) {
      this.logger.warn(`Ignoring unreadable config file ${configPath}, using defaults`, {
        error: describeError(error),
      });
      return {};
    }

    const config = sanitizeConfig(parsed);
    const ignored = isPlainObject(parsed)
      ? Object.keys(parsed).filter((key) => !(key in config))
      : ["(not an object)"];
    if (ignored.length > 0) {
      this.logger.warn(`Ignoring invalid config entries in ${configPath}: ${ignored.join(", ")}`);
    }
    return config;
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = process.env.HOME;
      if (!home) {
        return join(this.projectRoot, rawPath.slice(2));
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getOutputFile(): string {
    return this.expandPath(this.config.outputFile ?? DEFAULT_OUTPUT_FILE);
  }

  getBatchSize(): number {
    return this.config.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  getMaxAttemptsPerItem(): number {
    return this.config.maxAttemptsPerItem ?? DEFAULT_MAX_ATTEMPTS_PER_ITEM;
  }

  getProgressInterval(): number {
    return this.config.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  }

  getModel(): string {
    return this.config.model ?? DEFAULT_MODEL;
  }

  getConfig(): Config {
    return this.config;
  }

  /**
   * Resolve the OpenAI API key: an explicit key wins, then the environment,
   * then each env file in the search paths (never overriding set variables)
   */
  resolveApiKey(env: NodeJS.ProcessEnv = process.env, explicitKey?: string): string {
    if (explicitKey) {
      env[API_KEY_ENV_VAR] = explicitKey;
      return explicitKey;
    }

    for (const candidate of this.getEnvSearchPaths()) {
      if (env[API_KEY_ENV_VAR]) {
        break;
      }
      const expanded = this.expandPath(candidate);
      if (!expanded || !existsSync(expanded)) {
        continue;
      }
      const parsed = parseEnv(readFileSync(expanded, "utf8"));
      for (const [key, value] of Object.entries(parsed)) {
        if (env[key] === undefined) {
          env[key] = value;
        }
      }
    }

    const apiKey = env[API_KEY_ENV_VAR];
    if (!apiKey) {
      throw new ConfigurationError(
        `No OpenAI API key found. Please provide one or set ${API_KEY_ENV_VAR} in the .env file.`
      );
    }
    return apiKey;
  }
}
