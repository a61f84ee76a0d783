/**
 * Generate a batch and persist it as CSV
 */

import { BatchAudit, describeSummary } from "./audit";
import { generateBatch } from "./batch";
import { writePromptsCsv } from "./csv";
import { BatchExhaustedError } from "./errors";
import { Logger, globalLogger } from "./logger";
import { GeneratedItem, RandomSource, TextGenerator } from "./types";

export interface GenerateAndSaveOptions {
  generator: TextGenerator;
  outputFile: string;
  count: number;
  random?: RandomSource;
  maxAttemptsPerItem?: number;
  progressInterval?: number;
  logger?: Logger;
  audit?: BatchAudit;
}

/**
 * The file is written only once the whole batch is in memory
 */
export async function generateAndSave(options: GenerateAndSaveOptions): Promise<GeneratedItem[]> {
  const logger = options.logger ?? globalLogger;
  const audit = options.audit ?? new BatchAudit();

  const outcome = await generateBatch(options.generator, options.count, {
    random: options.random,
    maxAttemptsPerItem: options.maxAttemptsPerItem,
    progressInterval: options.progressInterval,
    logger,
    audit,
  });

  logger.info(describeSummary(audit.getSummary()));

  if (outcome.status === "exhausted") {
    throw new BatchExhaustedError(outcome.itemId, outcome.attempts);
  }

  writePromptsCsv(options.outputFile, outcome.items);

  logger.info(`Successfully generated ${outcome.items.length} unique futuristic prompts!`);
  logger.info(`Saved to: ${options.outputFile}`);
  return outcome.items;
}
