/**
 * Uniqueness-enforcing batch generation
 */

import { BatchAudit } from "./audit";
import { DEFAULT_MAX_ATTEMPTS_PER_ITEM, DEFAULT_PROGRESS_INTERVAL } from "./config";
import { requestPrompt } from "./llm";
import { Logger, globalLogger } from "./logger";
import { sampleParameters } from "./sampler";
import { BatchOutcome, GeneratedItem, RandomSource, TextGenerator } from "./types";
import { preview } from "./utils";

export interface BatchOptions {
  random?: RandomSource;
  maxAttemptsPerItem?: number;
  progressInterval?: number;
  logger?: Logger;
  audit?: BatchAudit;
}

/**
 * Generate `count` prompts with pairwise-distinct text, numbered 1..count.
 * A response equal to an accepted prompt is discarded and re-sampled; an item
 * whose attempts all return duplicates ends the batch as "exhausted".
 * Generation failures propagate unchanged.
 */
export async function generateBatch(
  generator: TextGenerator,
  count: number,
  options: BatchOptions = {}
): Promise<BatchOutcome> {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Batch size must be a non-negative integer, got ${count}`);
  }

  const random = options.random ?? Math.random;
  const maxAttempts = options.maxAttemptsPerItem ?? DEFAULT_MAX_ATTEMPTS_PER_ITEM;
  const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const logger = options.logger ?? globalLogger;
  const audit = options.audit;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttemptsPerItem must be a positive integer, got ${maxAttempts}`);
  }
  if (!Number.isInteger(progressInterval) || progressInterval < 1) {
    throw new RangeError(`progressInterval must be a positive integer, got ${progressInterval}`);
  }

  const seen = new Set<string>();
  const items: GeneratedItem[] = [];

  logger.setContext({ phase: "generate", component: "batch" });
  logger.info(`Generating ${count} unique futuristic prompts...`);
  logger.startTimer("batch");

  try {
    for (let id = 1; id <= count; id += 1) {
      logger.setContext({ item: id });
      let accepted: string | undefined;
      let attempt = 0;

      while (accepted === undefined && attempt < maxAttempts) {
        attempt += 1;
        logger.setContext({ attempt });
        const params = sampleParameters(random);
        const text = await requestPrompt(generator, params);

        if (seen.has(text)) {
          audit?.recordDuplicate(id, attempt, params, text);
          logger.debug("Duplicate prompt discarded, re-sampling", { text: preview(text) });
          continue;
        }

        audit?.recordAccepted(id, attempt, params, text);
        accepted = text;
      }

      logger.popContext(["attempt"]);

      if (accepted === undefined) {
        audit?.recordExhausted(id, attempt);
        logger.warn(`No unique prompt after ${attempt} attempt(s)`);
        return { status: "exhausted", items, itemId: id, attempts: attempt };
      }

      seen.add(accepted);
      items.push(Object.freeze({ id, text: accepted }));

      if (id % progressInterval === 0) {
        logger.info(`Progress: ${id}/${count} prompts generated`);
      }
    }

    logger.popContext(["item"]);
    logger.endTimer("batch", `Generated ${items.length} prompts`);
    return { status: "complete", items };
  } finally {
    logger.popContext(["phase", "component", "item", "attempt"]);
  }
}
