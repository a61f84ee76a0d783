/**
 * LLM Integration Module
 * Handles persona and query construction, and communication with the
 * OpenAI Responses API
 */

import OpenAI from "openai";
import { GenerationError, describeError } from "./errors";
import { GenerationRequest, ParameterSet, TextGenerator } from "./types";

export const DEFAULT_MODEL = "gpt-4.1-mini";

export const PERSONA_DIRECTIVES: readonly string[] = [
  "Presents a realistic extrapolation of current technology trends with specific innovations",
  "Depicts nuanced integration between AI systems, technology, and biological entities",
  "Balances utopian and practical elements, showing both benefits and challenges",
  "Uses rich, varied sensory details and specific, non-repetitive terminology",
  "Creates a clear visual scene with distinct aesthetic styles beyond cyberpunk clichés",
  "Considers unexpected societal, ethical, environmental, or philosophical implications",
  "Varies syntax, perspective, and tone to prevent formulaic structures",
  "Diversifies settings across multiple environments (not just orbital/space)",
  "Introduces culturally diverse perspectives on future technology integration",
  "Incorporates a unique technological or social innovation in each prompt",
  "Includes cyberpunk elements: corporate power structures, urban decay contrasted with high-tech, or underground resistance movements",
  "Assumes 2077 baseline technologies: neural implants, quantum AI, bioengineered organisms, climate manipulation, space colonization",
  "Varies emotional tones from hopeful to cautionary, mysterious to mundane",
  "Ends with a complete thought and scene resolution",
  "Avoids repeating phrases across consecutive prompts in a batch",
  "Includes at least one unexpected sensory detail (taste, smell, texture, temperature, or pressure) that grounds the reader",
  "Adds subtle physical interactions between characters and technology that show adaptation or resistance",
  "When referencing specific cultures, includes authentic details (architectural elements, social structures, spiritual practices) rather than surface aesthetics",
  "Shows how different cultural approaches to technology create distinct solutions or conflicts",
  "Names one concrete light source or atmospheric condition a digital artist could render directly",
];

export const AVOIDED_VOCABULARY: readonly string[] = ["bioluminescent", "translucent", "seamlessly", "orbital"];

/**
 * Builds the fixed persona that defines the model's voice and output format
 */
export function buildPersonaInstructions(): string {
  const lines = [
    "You are a creative futurist specializing in generating highly diverse, imaginative prompts",
    "about how technology, AI, and biological beings might coexist 100 years from now.",
    "",
    "When given a category and parameters, create a highly detailed, evocative prompt that:",
    ...PERSONA_DIRECTIVES.map((directive, index) => `${index + 1}. ${directive}`),
    "",
    `IMPORTANT: Avoid repetitive vocabulary such as ${AVOIDED_VOCABULARY.map((word) => `"${word}"`).join(", ")}, etc.`,
    "Expand your linguistic palette for each new prompt. Vary sentence structures and prompt formats",
    "to prevent formulaic patterns like \"In a [location], [bio-tech elements] collaborate with",
    "[AI/humans] while [atmospheric details]\".",
    "",
    "Format your response as a single paragraph (50-75 words) with no prefacing text.",
  ];

  return lines.join("\n");
}

/**
 * Build the per-call query from a parameter set
 */
export function buildUserMessage(params: ParameterSet): string {
  const sections = [
    "Create a detailed, imaginative prompt for digital art depicting futuristic coexistence",
    "between technology, AI, and beings 100 years from now.",
    "",
    `Category: ${params.category}`,
    `Technology Level: ${params.technologyLevel}`,
    `Setting: ${params.setting}`,
    `Tone: ${params.tone}`,
    `Focus: ${params.focus}`,
    "",
    "Make it specific, visual, and evocative. The prompt should be a rich description that",
    "could be used to generate digital art.",
  ];

  return sections.join("\n");
}

export function buildGenerationRequest(params: ParameterSet): GenerationRequest {
  return {
    instructions: buildPersonaInstructions(),
    input: buildUserMessage(params),
    params,
  };
}

/**
 * Request one prompt for a parameter set and return the trimmed text
 */
export async function requestPrompt(generator: TextGenerator, params: ParameterSet): Promise<string> {
  const text = await generator.generate(buildGenerationRequest(params));
  return text.trim();
}

export type ResponseRequest = {
  model: string;
  instructions: string;
  input: string;
};

export type CreateResponse = (request: ResponseRequest) => Promise<{ output_text: string }>;

export interface OpenAITextGeneratorOptions {
  apiKey: string;
  model?: string;
  /** Replaces the SDK call, mainly for tests */
  createResponse?: CreateResponse;
}

export class OpenAITextGenerator implements TextGenerator {
  readonly model: string;
  private createResponse: CreateResponse;

  constructor(options: OpenAITextGeneratorOptions) {
    this.model = options.model ?? DEFAULT_MODEL;

    if (options.createResponse) {
      this.createResponse = options.createResponse;
    } else {
      const openai = new OpenAI({ apiKey: options.apiKey });
      this.createResponse = (request) => openai.responses.create(request);
    }
  }

  async generate(request: GenerationRequest): Promise<string> {
    try {
      const completion = await this.createResponse({
        model: this.model,
        instructions: request.instructions,
        input: request.input,
      });
      return completion.output_text ?? "";
    } catch (error) {
      throw new GenerationError(`OpenAI request failed (model ${this.model}): ${describeError(error)}`, error);
    }
  }
}
