/**
 * Error taxonomy for prompt generation runs
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class GenerationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "GenerationError";
  }
}

export class BatchExhaustedError extends Error {
  readonly itemId: number;
  readonly attempts: number;

  constructor(itemId: number, attempts: number) {
    super(`Prompt ${itemId} returned only duplicates after ${attempts} attempt(s)`);
    this.name = "BatchExhaustedError";
    this.itemId = itemId;
    this.attempts = attempts;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
