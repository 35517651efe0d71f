/**
 * @pseudolex/languages
 * Language plugins, the strictness → dictionary-chain policy,
 * the immutable registry and the bundled language data.
 */
export type { LanguagePlugin, DictionarySources, ChainTarget } from "./plugin.js";
export { ProfileLanguagePlugin, buildDictionaryChain } from "./plugin.js";
export type { DefaultRegistryOptions } from "./registry.js";
export {
  LanguageRegistry, LanguageRegistryBuilder, DEFAULT_LANGUAGE, createDefaultRegistry, getDefaultRegistry,
} from "./registry.js";
export { BUNDLED_DATA_DIR, parseLanguageData, loadLanguageFile, loadLanguageDirectory } from "./loader.js";
