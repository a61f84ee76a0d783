/**
 * Utility functions used across the prompt generator
 */

import { createHash } from "crypto";
import { RandomSource } from "./types";

/**
 * Generate SHA256 hash of text
 */
export function hashText(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Normalize whitespace in a string
 */
export function normalize(key: string): string {
  return key.replace(/\s+/g, " ").trim();
}

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Check if value is an integer >= 1
 */
export function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

/**
 * Seeded PRNG (mulberry32)
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Pick one element uniformly
 */
export function pick<T>(values: readonly T[], random: RandomSource = Math.random): T {
  if (values.length === 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  const index = Math.min(Math.floor(random() * values.length), values.length - 1);
  return values[index];
}

/**
 * Shorten text for log output
 */
export function preview(text: string, max: number = 60): string {
  const flat = normalize(text);
  return flat.length > max ? `${flat.substring(0, max)}...` : flat;
}
