/**
 * Shared type definitions for the vision prompt generator
 */

export type Config = {
  envSearchPaths?: string[];
  outputFile?: string;
  batchSize?: number;
  maxAttemptsPerItem?: number;
  progressInterval?: number;
  model?: string;
};

export type TechnologyLevel = "early-stage" | "mature" | "post-singularity";

export type Setting = "urban" | "orbital" | "underwater" | "martian" | "wilderness" | "space";

export type Tone = "optimistic" | "pragmatic" | "complex" | "contemplative";

export type Focus = "daily life" | "work" | "art" | "governance" | "exploration" | "communication";

export type ParameterSet = Readonly<{
  category: string;
  technologyLevel: TechnologyLevel;
  setting: Setting;
  tone: Tone;
  focus: Focus;
}>;

/**
 * Returns a float in [0, 1), like Math.random
 */
export type RandomSource = () => number;

export type GeneratedItem = Readonly<{
  id: number;
  text: string;
}>;

export type BatchOutcome =
  | { status: "complete"; items: GeneratedItem[] }
  | { status: "exhausted"; items: GeneratedItem[]; itemId: number; attempts: number };

export type GenerationRequest = {
  instructions: string;
  input: string;
  params: ParameterSet;
};

/**
 * Remote text-generation capability. Implementations reject with a
 * GenerationError when the underlying call fails.
 */
export interface TextGenerator {
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}
