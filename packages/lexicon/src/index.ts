/**
 * @pseudolex/lexicon - real-word judges
 *
 * Every backend answers one question: "is this string a real word?"
 * Matching is case-insensitive. Backends are immutable after construction,
 * except that the optional ones may switch themselves off when their data
 * source turns out to be missing or broken.
 *
 *   BuiltinCommonWordsDictionary - the language's fixed ultra-common words
 *   StaticWordSetDictionary      - any caller-supplied list (must be non-empty)
 *   FrequencyDictionary          - Zipf-scale frequency lookup (optional)
 *   WordListDictionary           - curated word list (optional)
 *   CompositeDictionary          - logical OR over any of the above
 */
import { ConfigError, FrequencyDataUnavailableError, DEFAULT_REAL_WORD_MIN_ZIPF, silentLogger } from "@pseudolex/shared-types";
import type { Logger } from "@pseudolex/shared-types";

export { ZipfTableLookup, FileWordListSource } from "./sources.js";

// ─── Contracts ────────────────────────────────────────────────────────────────

export interface DictionaryBackend {
  isRealWord(word: string): boolean;
}

/** A backend whose data source may be absent. `available` is fixed at construction. */
export interface OptionalDictionaryBackend extends DictionaryBackend {
  readonly available: boolean;
}

/**
 * External word-frequency source. Scores are Zipf values (log10 of
 * frequency per billion words; ~1 rare, ~7 "the").
 * Throws FrequencyDataUnavailableError when it has no data for `language`.
 */
export interface FrequencyLookup {
  zipfFrequency(word: string, language: string): number;
}

/** Returns null when no list exists for `language`. */
export interface WordListSource {
  load(language: string): readonly string[] | null;
}

// ─── Fixed sets ───────────────────────────────────────────────────────────────

export class BuiltinCommonWordsDictionary implements DictionaryBackend {
  private readonly words: ReadonlySet<string>;

  constructor(words: readonly string[]) {
    this.words = new Set(words.map(w => w.toLowerCase()));
  }

  isRealWord(word: string): boolean {
    return this.words.has(word.toLowerCase());
  }

  get size(): number { return this.words.size; }
}

export class StaticWordSetDictionary implements DictionaryBackend {
  private readonly words: ReadonlySet<string>;

  constructor(words: readonly string[]) {
    if (words.length === 0) throw new ConfigError("StaticWordSetDictionary requires at least one word.");
    this.words = new Set(words.map(w => w.toLowerCase()));
  }

  isRealWord(word: string): boolean {
    return this.words.has(word.toLowerCase());
  }
}

// ─── Frequency-based ──────────────────────────────────────────────────────────

export interface FrequencyDictionaryOptions {
  /** Frequency-corpus language code, e.g. "en" */
  language?: string;
  /** Words scoring at or above this Zipf value are real. Lower = more words flagged. */
  minZipf?: number;
  logger?: Logger;
}

/**
 * Probes its lookup once at construction. Missing data leaves it unavailable
 * and every query answers false. A lookup that throws later switches the
 * backend off for the rest of its lifetime.
 */
export class FrequencyDictionary implements OptionalDictionaryBackend {
  readonly language: string;
  readonly minZipf: number;
  readonly available: boolean;
  private live: boolean;
  private readonly logger: Logger;

  constructor(private readonly lookup: FrequencyLookup | null, options: FrequencyDictionaryOptions = {}) {
    this.language = options.language ?? "en";
    this.minZipf = options.minZipf ?? DEFAULT_REAL_WORD_MIN_ZIPF;
    this.logger = options.logger ?? silentLogger;
    this.available = this.probe();
    this.live = this.available;
  }

  /** False once the backend has switched itself off. */
  get enabled(): boolean { return this.live; }

  isRealWord(word: string): boolean {
    if (!this.live || !this.lookup) return false;
    try {
      return this.lookup.zipfFrequency(word.toLowerCase(), this.language) >= this.minZipf;
    } catch (err) {
      this.live = false;
      this.logger.error(
        { err, language: this.language, word },
        "frequency lookup failed; disabling frequency backend for this run"
      );
      return false;
    }
  }

  private probe(): boolean {
    if (!this.lookup) {
      this.logger.warn({ language: this.language }, "no frequency data source configured; frequency backend disabled");
      return false;
    }
    try {
      this.lookup.zipfFrequency("probe", this.language);
      return true;
    } catch (err) {
      if (err instanceof FrequencyDataUnavailableError) {
        this.logger.warn({ language: this.language, reason: err.message }, "frequency data unavailable; frequency backend disabled");
      } else {
        this.logger.error({ err, language: this.language }, "unexpected error while probing frequency data; frequency backend disabled");
      }
      return false;
    }
  }
}

// ─── Curated word list ────────────────────────────────────────────────────────

export interface WordListDictionaryOptions {
  language?: string;
  logger?: Logger;
}

export class WordListDictionary implements OptionalDictionaryBackend {
  readonly language: string;
  readonly available: boolean;
  private readonly words: ReadonlySet<string>;

  constructor(source: WordListSource | null, options: WordListDictionaryOptions = {}) {
    this.language = options.language ?? "en";
    const logger = options.logger ?? silentLogger;
    let words: readonly string[] = [];
    if (!source) {
      logger.warn({ language: this.language }, "no word-list source configured; word-list backend disabled");
    } else {
      try {
        words = source.load(this.language) ?? [];
        if (words.length === 0)
          logger.warn({ language: this.language }, "no curated word list for language; word-list backend disabled");
      } catch (err) {
        logger.error({ err, language: this.language }, "failed to load curated word list; word-list backend disabled");
      }
    }
    this.words = new Set(words.map(w => w.toLowerCase()));
    this.available = this.words.size > 0;
  }

  isRealWord(word: string): boolean {
    return this.available && this.words.has(word.toLowerCase());
  }
}

// ─── Composite ────────────────────────────────────────────────────────────────

export class CompositeDictionary implements DictionaryBackend {
  readonly backends: readonly DictionaryBackend[];

  constructor(backends: readonly DictionaryBackend[]) {
    if (backends.length === 0) throw new ConfigError("CompositeDictionary requires at least one backend.");
    this.backends = [...backends];
  }

  isRealWord(word: string): boolean {
    return this.backends.some(b => b.isRealWord(word));
  }
}

/** A chain of one is returned as-is. */
export function composeDictionaries(backends: readonly DictionaryBackend[]): DictionaryBackend {
  const [only] = backends;
  if (backends.length === 1 && only) return only;
  return new CompositeDictionary(backends);
}
