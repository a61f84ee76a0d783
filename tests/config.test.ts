/**
 * Test suite for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import {
  ConfigManager,
  DEFAULT_BATCH_SIZE,
  DEFAULT_ENV_SEARCH_PATHS,
  DEFAULT_MAX_ATTEMPTS_PER_ITEM,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_PROGRESS_INTERVAL,
  sanitizeConfig,
} from "../tooling/lib/config";
import { ConfigurationError } from "../tooling/lib/errors";
import { Logger } from "../tooling/lib/logger";
import { writeFileSync, existsSync, mkdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

describe("ConfigManager", () => {
  let configPath: string;
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = join(tmpdir(), `project-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(projectRoot, { recursive: true });
    configPath = join(projectRoot, "vision.config.json");
  });

  afterEach(() => {
    if (existsSync(projectRoot)) {
      rmSync(projectRoot, { recursive: true, force: true });
    }
  });

  it("should load default config when file does not exist", () => {
    const manager = new ConfigManager(projectRoot, configPath);

    expect(manager.getEnvSearchPaths()).toEqual(DEFAULT_ENV_SEARCH_PATHS);
    expect(manager.getOutputFile()).toBe(join(projectRoot, DEFAULT_OUTPUT_FILE));
    expect(manager.getBatchSize()).toBe(DEFAULT_BATCH_SIZE);
    expect(manager.getMaxAttemptsPerItem()).toBe(DEFAULT_MAX_ATTEMPTS_PER_ITEM);
    expect(manager.getProgressInterval()).toBe(DEFAULT_PROGRESS_INTERVAL);
    expect(manager.getModel()).toBe("gpt-4.1-mini");
  });

  it("should default to 300 prompts written to 2077_future_vision.csv", () => {
    expect(DEFAULT_BATCH_SIZE).toBe(300);
    expect(DEFAULT_OUTPUT_FILE).toBe("2077_future_vision.csv");
  });

  it("should load custom config from file", () => {
    const customConfig = {
      envSearchPaths: [".env.custom"],
      outputFile: "out/prompts.csv",
      batchSize: 12,
      maxAttemptsPerItem: 3,
      progressInterval: 4,
      model: "custom-model",
    };

    writeFileSync(configPath, JSON.stringify(customConfig), "utf8");
    const manager = new ConfigManager(projectRoot, configPath);

    expect(manager.getEnvSearchPaths()).toEqual([".env.custom"]);
    expect(manager.getOutputFile()).toBe(join(projectRoot, "out/prompts.csv"));
    expect(manager.getBatchSize()).toBe(12);
    expect(manager.getMaxAttemptsPerItem()).toBe(3);
    expect(manager.getProgressInterval()).toBe(4);
    expect(manager.getModel()).toBe("custom-model");
    expect(manager.getConfig()).toEqual(customConfig);
  });

  it("should read vision.config.json from the project root by default", () => {
    writeFileSync(configPath, JSON.stringify({ batchSize: 7 }), "utf8");
    const manager = new ConfigManager(projectRoot);

    expect(manager.getBatchSize()).toBe(7);
  });

  it("should fall back to defaults for invalid entries", () => {
    writeFileSync(
      configPath,
      JSON.stringify({ batchSize: -3, maxAttemptsPerItem: 0, progressInterval: "10", envSearchPaths: [1], model: "" }),
      "utf8"
    );
    const manager = new ConfigManager(projectRoot, configPath, new Logger("debug", false));

    expect(manager.getConfig()).toEqual({});
    expect(manager.getBatchSize()).toBe(DEFAULT_BATCH_SIZE);
  });

  it("should fall back to defaults and warn on invalid JSON", () => {
    const logger = new Logger("debug", false);
    writeFileSync(configPath, "{ invalid json }", "utf8");
    const manager = new ConfigManager(projectRoot, configPath, logger);

    expect(manager.getEnvSearchPaths()).toEqual(DEFAULT_ENV_SEARCH_PATHS);
    expect(logger.getEntriesAtLevel("warn").map((entry) => entry.message)).toEqual([
      `Ignoring unreadable config file ${configPath}, using defaults`,
    ]);
  });

  it("should warn about misspelled or invalid entries", () => {
    const logger = new Logger("debug", false);
    writeFileSync(configPath, JSON.stringify({ batchSise: 5, maxAttemptsPerItem: 0, model: "m" }), "utf8");
    const manager = new ConfigManager(projectRoot, configPath, logger);

    expect(manager.getConfig()).toEqual({ model: "m" });
    expect(logger.getMessages()).toEqual([
      `Ignoring invalid config entries in ${configPath}: batchSise, maxAttemptsPerItem`,
    ]);
  });

  it("should not warn for a valid config file", () => {
    const logger = new Logger("debug", false);
    writeFileSync(configPath, JSON.stringify({ batchSize: 2 }), "utf8");
    new ConfigManager(projectRoot, configPath, logger);

    expect(logger.getEntries()).toEqual([]);
  });

  it("should expand relative paths", () => {
    const manager = new ConfigManager(projectRoot, configPath);

    expect(manager.expandPath("subdir/file.txt")).toBe(join(projectRoot, "subdir/file.txt"));
  });

  it("should expand home directory paths", () => {
    const manager = new ConfigManager(projectRoot, configPath);
    const expanded = manager.expandPath("~/Documents/test.txt");

    expect(expanded).toContain("Documents/test.txt");
    expect(expanded).not.toContain("~");
  });

  describe("without HOME", () => {
    const savedHome = process.env.HOME;

    afterEach(() => {
      if (savedHome === undefined) {
        delete process.env.HOME;
      } else {
        process.env.HOME = savedHome;
      }
    });

    it("should resolve home paths against the project root", () => {
      delete process.env.HOME;
      const manager = new ConfigManager(projectRoot, configPath);

      expect(manager.expandPath("~/keys/.env")).toBe(join(projectRoot, "keys/.env"));
    });
  });

  it("should leave absolute paths unchanged", () => {
    const manager = new ConfigManager(projectRoot, configPath);

    expect(manager.expandPath("/absolute/path/to/file.txt")).toBe("/absolute/path/to/file.txt");
  });

  describe("sanitizeConfig", () => {
    it("should ignore non-object input", () => {
      expect(sanitizeConfig(null)).toEqual({});
      expect(sanitizeConfig([1, 2])).toEqual({});
    });

    it("should accept a batch size of zero", () => {
      expect(sanitizeConfig({ batchSize: 0 })).toEqual({ batchSize: 0 });
    });
  });

  describe("resolveApiKey", () => {
    it("should prefer an explicit key", () => {
      const env: NodeJS.ProcessEnv = { OPENAI_API_KEY: "from-env" };
      const manager = new ConfigManager(projectRoot, configPath);

      expect(manager.resolveApiKey(env, "explicit-key")).toBe("explicit-key");
      expect(env.OPENAI_API_KEY).toBe("explicit-key");
    });

    it("should use the environment before env files", () => {
      writeFileSync(join(projectRoot, ".env"), "OPENAI_API_KEY=from-file\n", "utf8");
      const manager = new ConfigManager(projectRoot, configPath);

      expect(manager.resolveApiKey({ OPENAI_API_KEY: "from-env" })).toBe("from-env");
    });

    it("should load the key from an env file", () => {
      writeFileSync(join(projectRoot, ".env"), "OPENAI_API_KEY=test-secret\nOTHER=value\n", "utf8");
      const env: NodeJS.ProcessEnv = { OTHER: "kept" };
      const manager = new ConfigManager(projectRoot, configPath);

      expect(manager.resolveApiKey(env)).toBe("test-secret");
      expect(env.OTHER).toBe("kept");
    });

    it("should search env files in order", () => {
      writeFileSync(configPath, JSON.stringify({ envSearchPaths: [".env.missing", "keys/.env"] }), "utf8");
      mkdirSync(join(projectRoot, "keys"));
      writeFileSync(join(projectRoot, "keys/.env"), "OPENAI_API_KEY=second-file\n", "utf8");
      const manager = new ConfigManager(projectRoot, configPath);

      expect(manager.resolveApiKey({})).toBe("second-file");
    });

    it("should throw a ConfigurationError when no key is found", () => {
      const manager = new ConfigManager(projectRoot, configPath);

      expect(() => manager.resolveApiKey({})).toThrow(ConfigurationError);
      expect(() => manager.resolveApiKey({})).toThrow(
        "No OpenAI API key found. Please provide one or set OPENAI_API_KEY in the .env file."
      );
    });
  });
});
