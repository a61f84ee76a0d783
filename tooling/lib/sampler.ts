/**
 * Seed parameter domains and sampling
 */

import { Focus, ParameterSet, RandomSource, Setting, TechnologyLevel, Tone } from "./types";
import { pick } from "./utils";

export const CATEGORIES: readonly string[] = [
  "Human-AI Integration", "Space Exploration", "Urban Development",
  "Biotechnology", "Communication", "Transportation", "Entertainment",
  "Environment", "Governance", "Work & Economy", "Education", "Healthcare",
  "Food Systems", "Art & Creativity", "Home & Living", "Social Structures",
  "Mars Colonization", "Neural Interfaces", "Quantum Computing", "Consciousness Transfer",
  "Ocean Colonization", "Genetic Engineering", "Climate Engineering", "Interstellar Travel",
];

export const TECHNOLOGY_LEVELS: readonly TechnologyLevel[] = ["early-stage", "mature", "post-singularity"];

export const SETTINGS: readonly Setting[] = ["urban", "orbital", "underwater", "martian", "wilderness", "space"];

export const TONES: readonly Tone[] = ["optimistic", "pragmatic", "complex", "contemplative"];

export const FOCUSES: readonly Focus[] = ["daily life", "work", "art", "governance", "exploration", "communication"];

/**
 * Draw one parameter set; each field is picked independently
 */
export function sampleParameters(random: RandomSource = Math.random): ParameterSet {
  return Object.freeze({
    category: pick(CATEGORIES, random),
    technologyLevel: pick(TECHNOLOGY_LEVELS, random),
    setting: pick(SETTINGS, random),
    tone: pick(TONES, random),
    focus: pick(FOCUSES, random),
  });
}
