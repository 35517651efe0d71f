import {
  AttemptsExhaustedError, ConfigError, UniqueWordsExhaustedError,
  DEFAULT_MAX_ATTEMPTS, DEFAULT_REAL_WORD_MIN_ZIPF, DEFAULT_WORD_BOUNDS, silentLogger,
} from "@pseudolex/shared-types";
import type { Logger, Strictness, WordBounds } from "@pseudolex/shared-types";
import { createRandom } from "@pseudolex/phonology";
import type { RandomSource } from "@pseudolex/phonology";
import { CompositeDictionary, StaticWordSetDictionary } from "@pseudolex/lexicon";
import type { DictionaryBackend } from "@pseudolex/lexicon";
import { DEFAULT_LANGUAGE, getDefaultRegistry } from "@pseudolex/languages";
import type { LanguagePlugin, LanguageRegistry } from "@pseudolex/languages";

export interface WordGeneratorOptions extends Partial<WordBounds> {
  /** Default "medium" */
  strictness?: Strictness;
  /** Skip the real-word check entirely */
  allowRealWords?: boolean;
  /** Always rejected, case-insensitive */
  bannedWords?: Iterable<string>;
  /** Overrides the plugin's strictness chain */
  dictionary?: DictionaryBackend;
  /** Extra words treated as real on top of the dictionary */
  knownWords?: readonly string[];
  random?: RandomSource;
  /** Ignored when `random` is given */
  seed?: number | string;
  /** Registry key, default "english" */
  language?: string;
  /** Takes precedence over `language` */
  languagePlugin?: LanguagePlugin;
  /** Where `language` is looked up; the bundled registry by default */
  registry?: LanguageRegistry;
  realWordMinZipf?: number;
  logger?: Logger;
}

interface RejectionCounts { length: number; banned: number; real: number }

// ─── Dictionary selection ─────────────────────────────────────────────────────

export interface DictionarySelection {
  language?: string;
  plugin?: LanguagePlugin;
  registry?: LanguageRegistry;
}

/** The real-word judge a generator would use for `strictness` in the chosen language. */
export function buildDictionaryForStrictness(
  strictness: Strictness,
  realWordMinZipf: number = DEFAULT_REAL_WORD_MIN_ZIPF,
  selection: DictionarySelection = {}
): DictionaryBackend {
  const plugin = selection.plugin ?? (selection.registry ?? getDefaultRegistry()).get(selection.language ?? DEFAULT_LANGUAGE);
  return plugin.buildDictionary(strictness, realWordMinZipf);
}

// ─── WordGenerator ────────────────────────────────────────────────────────────

/**
 * Rejection sampler: ask the language plugin for candidates and keep the
 * first one whose length is in bounds, that is not banned and, unless
 * real words are allowed, that no dictionary backend recognises.
 */
export class WordGenerator {
  readonly minLength: number;
  readonly maxLength: number;
  readonly minSyllables: number;
  readonly maxSyllables: number;
  readonly strictness: Strictness;
  readonly allowRealWords: boolean;
  readonly plugin: LanguagePlugin;
  readonly dictionary: DictionaryBackend;
  /** Shared with TextGenerator so a seed reproduces whole texts. */
  readonly random: RandomSource;
  private readonly banned: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: WordGeneratorOptions = {}) {
    const minLength = options.minLength ?? DEFAULT_WORD_BOUNDS.minLength;
    const maxLength = options.maxLength ?? DEFAULT_WORD_BOUNDS.maxLength;
    const minSyllables = options.minSyllables ?? DEFAULT_WORD_BOUNDS.minSyllables;
    const maxSyllables = options.maxSyllables ?? DEFAULT_WORD_BOUNDS.maxSyllables;

    for (const [key, value] of Object.entries({ minLength, maxLength, minSyllables, maxSyllables })) {
      if (!Number.isInteger(value)) throw new ConfigError(`${key} must be an integer, got ${value}.`);
    }
    if (minLength < 1) throw new ConfigError("minLength must be at least 1.");
    if (maxLength < minLength) throw new ConfigError("maxLength must be >= minLength.");
    if (minSyllables < 1) throw new ConfigError("minSyllables must be at least 1.");
    if (maxSyllables < minSyllables) throw new ConfigError("maxSyllables must be >= minSyllables.");

    this.minLength = minLength;
    this.maxLength = maxLength;
    this.minSyllables = minSyllables;
    this.maxSyllables = maxSyllables;
    this.strictness = options.strictness ?? "medium";
    this.allowRealWords = options.allowRealWords ?? false;
    this.logger = options.logger ?? silentLogger;
    this.random = options.random ?? createRandom(options.seed);
    this.plugin = options.languagePlugin
      ?? (options.registry ?? getDefaultRegistry()).get(options.language ?? DEFAULT_LANGUAGE);
    const dictionary = options.dictionary
      ?? this.plugin.buildDictionary(this.strictness, options.realWordMinZipf ?? DEFAULT_REAL_WORD_MIN_ZIPF);
    this.dictionary = options.knownWords && options.knownWords.length > 0
      ? new CompositeDictionary([dictionary, new StaticWordSetDictionary(options.knownWords)])
      : dictionary;
    this.banned = new Set([...(options.bannedWords ?? [])].map(w => w.toLowerCase()));
  }

  /** Throws AttemptsExhaustedError when no candidate passes within `maxAttempts`. */
  generateOne(maxAttempts: number = DEFAULT_MAX_ATTEMPTS): string {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) throw new ConfigError("maxAttempts must be an integer of at least 1.");

    const rejected: RejectionCounts = { length: 0, banned: 0, real: 0 };
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const candidate = this.plugin.buildCandidate(this.random, this.minSyllables, this.maxSyllables, this.maxLength);

      if (candidate.length < this.minLength || candidate.length > this.maxLength) { rejected.length++; continue; }
      if (this.banned.has(candidate)) { rejected.banned++; continue; }
      if (!this.allowRealWords && this.dictionary.isRealWord(candidate)) { rejected.real++; continue; }
      return candidate;
    }

    this.logger.warn({ language: this.plugin.name, maxAttempts, rejected }, "attempt budget exhausted");
    throw new AttemptsExhaustedError(maxAttempts);
  }

  /**
   * `count` words in generation order. With `unique`, repeats are discarded
   * and the whole batch gives up after `maxDraws` calls to generateOne.
   */
  generateMany(count: number, unique = true, maxDraws: number = Math.max(DEFAULT_MAX_ATTEMPTS, count * 100)): string[] {
    if (!Number.isInteger(count) || count < 1) throw new ConfigError("count must be an integer of at least 1.");

    const results: string[] = [];
    const seen = new Set<string>();
    let draws = 0;

    while (results.length < count) {
      if (unique && draws >= maxDraws) {
        this.logger.warn({ language: this.plugin.name, count, collected: results.length, draws }, "unique batch gave up");
        throw new UniqueWordsExhaustedError(count, results.length, draws);
      }
      const word = this.generateOne();
      draws++;
      if (unique) {
        if (seen.has(word)) continue;
        seen.add(word);
      }
      results.push(word);
    }

    this.logger.debug({ language: this.plugin.name, count, draws }, "batch generated");
    return results;
  }
}
