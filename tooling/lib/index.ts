/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./utils";
export * from "./sampler";
export * from "./llm";
export * from "./batch";
export * from "./csv";
export * from "./pipeline";
export * from "./audit";
export * from "./logger";
