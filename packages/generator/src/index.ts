/**
 * @pseudolex/generator
 * Rejection-sampling word generator, pseudo-text on top of it,
 * and whole-config validation.
 */
export { WordGenerator, buildDictionaryForStrictness } from "./generator.js";
export type { WordGeneratorOptions, DictionarySelection } from "./generator.js";
export { TextGenerator, PUNCTUATION } from "./textgen.js";
export type { WordSource } from "./textgen.js";
export { validateConfig } from "./config.js";
export type { GenerationConfig } from "./config.js";
