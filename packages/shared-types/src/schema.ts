/**
 * pseudolex data model v1
 *
 * Single source of truth for the shapes every package reads and writes:
 * phonotactic profiles, strictness levels, generator options and the
 * on-disk language data file.
 */

// ─── Phonotactics ────────────────────────────────────────────────────────────

/**
 * The legal syllable pieces of one language variant.
 * The empty string is a valid onset or coda ("no onset/coda"),
 * never a valid nucleus.
 */
export interface PhonotacticProfile {
  readonly onsets: readonly string[];
  readonly nuclei: readonly string[];
  readonly codas: readonly string[];
}

// ─── Strictness ──────────────────────────────────────────────────────────────

/**
 * Policy selector for the real-word dictionary chain.
 * Not a numeric scale: each level maps to a fixed set of backends.
 */
export type Strictness = "loose" | "medium" | "strict" | "very_strict";

export const STRICTNESS_LEVELS: readonly Strictness[] = ["loose", "medium", "strict", "very_strict"];

/** Default Zipf threshold above which a word counts as "real". */
export const DEFAULT_REAL_WORD_MIN_ZIPF = 2.7;

/** VERY_STRICT caps the frequency threshold at this value. */
export const VERY_STRICT_MAX_ZIPF = 2.0;

// ─── Generation bounds ───────────────────────────────────────────────────────

export interface WordBounds {
  minLength: number;
  maxLength: number;
  minSyllables: number;
  maxSyllables: number;
}

export const DEFAULT_WORD_BOUNDS: Readonly<WordBounds> = {
  minLength: 4,
  maxLength: 10,
  minSyllables: 1,
  maxSyllables: 3,
};

export const DEFAULT_MAX_ATTEMPTS = 1000;

export interface SentenceBounds {
  minWords: number;
  maxWords: number;
}

export interface ParagraphBounds extends SentenceBounds {
  minSentences: number;
  maxSentences: number;
}

export const DEFAULT_PARAGRAPH_BOUNDS: Readonly<ParagraphBounds> = {
  minWords: 4,
  maxWords: 9,
  minSentences: 2,
  maxSentences: 5,
};

// ─── Language data file ──────────────────────────────────────────────────────

/** Shape of packages/languages/data/<name>.json */
export interface LanguageData extends PhonotacticProfile {
  /** Registry key, lowercase, e.g. "english" */
  name: string;
  /** Frequency-corpus language code, e.g. "en", "fil" */
  code: string;
  /** Ultra-common words always treated as real */
  commonWords: readonly string[];
}
