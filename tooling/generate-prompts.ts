#!/usr/bin/env node
import { ConfigManager } from "./lib/config";
import { ConfigurationError, describeError } from "./lib/errors";
import { OpenAITextGenerator } from "./lib/llm";
import { Logger, globalLogger } from "./lib/logger";
import { generateAndSave } from "./lib/pipeline";
import { RandomSource, TextGenerator } from "./lib/types";

export interface CliOptions {
  cwd: string;
  argv: string[];
  env: NodeJS.ProcessEnv;
  logger?: Logger;
  random?: RandomSource;
  createGenerator?: (apiKey: string, model: string) => TextGenerator;
}

function createOpenAIGenerator(apiKey: string, model: string): TextGenerator {
  return new OpenAITextGenerator({ apiKey, model });
}

/**
 * Run one generation and return the process exit code
 */
export async function runCli(options: CliOptions): Promise<number> {
  const logger = options.logger ?? globalLogger;
  const config = new ConfigManager(options.cwd, undefined, logger);

  // Optional positional argument: output path
  const outputFile = options.argv[0] ? config.expandPath(options.argv[0]) : config.getOutputFile();
  const createGenerator = options.createGenerator ?? createOpenAIGenerator;

  try {
    const apiKey = config.resolveApiKey(options.env);
    const generator = createGenerator(apiKey, config.getModel());

    logger.info(`Generating prompts with ${generator.model}...`);
    await generateAndSave({
      generator,
      outputFile,
      count: config.getBatchSize(),
      random: options.random,
      maxAttemptsPerItem: config.getMaxAttemptsPerItem(),
      progressInterval: config.getProgressInterval(),
      logger,
    });
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`);
      logger.error("Please ensure your OpenAI API key is correctly configured in the .env file.");
    } else {
      logger.error(`Error during prompt generation: ${describeError(error)}`);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli({ cwd: process.cwd(), argv: process.argv.slice(2), env: process.env })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error);
      process.exitCode = 1;
    });
}
