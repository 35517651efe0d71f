import { VERY_STRICT_MAX_ZIPF, silentLogger } from "@pseudolex/shared-types";
import type { LanguageData, Logger, PhonotacticProfile, Strictness } from "@pseudolex/shared-types";
import { buildCandidate } from "@pseudolex/phonology";
import type { RandomSource } from "@pseudolex/phonology";
import {
  BuiltinCommonWordsDictionary, FrequencyDictionary, WordListDictionary, composeDictionaries,
} from "@pseudolex/lexicon";
import type { DictionaryBackend, FrequencyLookup, OptionalDictionaryBackend, WordListSource } from "@pseudolex/lexicon";

// ─── Contract ─────────────────────────────────────────────────────────────────

/**
 * One target language: how to assemble candidates and how to judge
 * whether a string is a real word at a given strictness.
 */
export interface LanguagePlugin {
  /** Registry key, lowercase */
  readonly name: string;
  /** Frequency-corpus code */
  readonly code: string;
  buildCandidate(random: RandomSource, minSyllables: number, maxSyllables: number, maxLength: number): string;
  buildDictionary(strictness: Strictness, realWordMinZipf: number): DictionaryBackend;
}

/** External data shared by every plugin of a registry. Absent sources degrade strictness. */
export interface DictionarySources {
  frequency?: FrequencyLookup | null;
  wordList?: WordListSource | null;
  logger?: Logger;
}

// ─── Strictness policy ────────────────────────────────────────────────────────

export interface ChainTarget {
  /** Used in log lines */
  name: string;
  code: string;
  commonWords: readonly string[];
}

/**
 * Strictness → backend chain. Same shape for every language:
 *
 *   loose        builtin common words
 *   medium       + frequency at `threshold`
 *   strict       + curated word list
 *   very_strict  as strict, frequency threshold capped at VERY_STRICT_MAX_ZIPF
 *
 * Backends whose data is missing are left out and the degradation is logged.
 */
export function buildDictionaryChain(
  strictness: Strictness,
  threshold: number,
  target: ChainTarget,
  sources: DictionarySources = {}
): DictionaryBackend {
  const logger = sources.logger ?? silentLogger;
  const chain: DictionaryBackend[] = [new BuiltinCommonWordsDictionary(target.commonWords)];
  if (strictness === "loose") return composeDictionaries(chain);

  const addIfAvailable = (backendName: string, backend: OptionalDictionaryBackend): void => {
    if (backend.available) { chain.push(backend); return; }
    logger.warn(
      { language: target.name, strictness, backend: backendName },
      `${backendName} backend unavailable for ${target.name}; ${strictness} strictness is degraded`
    );
  };

  const minZipf = strictness === "very_strict" ? Math.min(threshold, VERY_STRICT_MAX_ZIPF) : threshold;
  addIfAvailable("frequency", new FrequencyDictionary(sources.frequency ?? null, { language: target.code, minZipf, logger }));

  if (strictness === "strict" || strictness === "very_strict") {
    addIfAvailable("word-list", new WordListDictionary(sources.wordList ?? null, { language: target.code, logger }));
  }

  return composeDictionaries(chain);
}

// ─── Profile-driven plugin ────────────────────────────────────────────────────

/** A language described entirely by data: a phonotactic profile plus its common words. */
export class ProfileLanguagePlugin implements LanguagePlugin {
  readonly name: string;
  readonly code: string;
  readonly profile: PhonotacticProfile;
  readonly commonWords: readonly string[];

  constructor(data: LanguageData, private readonly sources: DictionarySources = {}) {
    this.name = data.name.toLowerCase();
    this.code = data.code;
    this.profile = { onsets: data.onsets, nuclei: data.nuclei, codas: data.codas };
    this.commonWords = data.commonWords;
  }

  buildCandidate(random: RandomSource, minSyllables: number, maxSyllables: number, maxLength: number): string {
    return buildCandidate(random, minSyllables, maxSyllables, maxLength, this.profile);
  }

  buildDictionary(strictness: Strictness, realWordMinZipf: number): DictionaryBackend {
    return buildDictionaryChain(strictness, realWordMinZipf, this, this.sources);
  }
}
