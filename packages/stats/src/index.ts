/**
 * Random sources and sample statistics for Monte Carlo pricing
 * @packageDocumentation
 */

export * from "./types.js";
export * from "./random.js";
export * from "./summary.js";
