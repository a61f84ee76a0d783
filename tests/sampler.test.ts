/**
 * Test suite for parameter sampling
 */

import { describe, it, expect } from "@jest/globals";
import {
  CATEGORIES,
  FOCUSES,
  SETTINGS,
  TECHNOLOGY_LEVELS,
  TONES,
  sampleParameters,
} from "../tooling/lib/sampler";
import { createSeededRandom } from "../tooling/lib/utils";
import { ParameterSet } from "../tooling/lib/types";

function sequence(values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

describe("sampleParameters", () => {
  const draws: ParameterSet[] = [];
  const random = createSeededRandom(42);
  for (let i = 0; i < 300; i += 1) {
    draws.push(sampleParameters(random));
  }

  it("should declare the fixed domains", () => {
    expect(CATEGORIES).toHaveLength(24);
    expect(TECHNOLOGY_LEVELS).toEqual(["early-stage", "mature", "post-singularity"]);
    expect(SETTINGS).toEqual(["urban", "orbital", "underwater", "martian", "wilderness", "space"]);
    expect(TONES).toEqual(["optimistic", "pragmatic", "complex", "contemplative"]);
    expect(FOCUSES).toEqual(["daily life", "work", "art", "governance", "exploration", "communication"]);
  });

  it("should draw categories from the category domain", () => {
    for (const params of draws) {
      expect(CATEGORIES).toContain(params.category);
    }
  });

  it("should draw technology levels from their domain", () => {
    for (const params of draws) {
      expect(TECHNOLOGY_LEVELS).toContain(params.technologyLevel);
    }
  });

  it("should draw settings from their domain", () => {
    for (const params of draws) {
      expect(SETTINGS).toContain(params.setting);
    }
  });

  it("should draw tones from their domain", () => {
    for (const params of draws) {
      expect(TONES).toContain(params.tone);
    }
  });

  it("should draw focuses from their domain", () => {
    for (const params of draws) {
      expect(FOCUSES).toContain(params.focus);
    }
  });

  it("should pick fields in declaration order from the random source", () => {
    const params = sampleParameters(sequence([0, 0.5, 0.5, 0.5, 0.5]));

    expect(params).toEqual({
      category: "Human-AI Integration",
      technologyLevel: "mature",
      setting: "martian",
      tone: "complex",
      focus: "governance",
    });
  });

  it("should reach the last value of each domain", () => {
    const params = sampleParameters(() => 0.999999);

    expect(params.category).toBe("Interstellar Travel");
    expect(params.technologyLevel).toBe("post-singularity");
    expect(params.setting).toBe("space");
    expect(params.tone).toBe("contemplative");
    expect(params.focus).toBe("communication");
  });

  it("should be reproducible for the same seed", () => {
    const first = sampleParameters(createSeededRandom(7));
    const second = sampleParameters(createSeededRandom(7));

    expect(first).toEqual(second);
  });

  it("should return a frozen record", () => {
    expect(Object.isFrozen(sampleParameters(createSeededRandom(1)))).toBe(true);
  });
});
