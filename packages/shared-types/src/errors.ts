/**
 * Error taxonomy shared by every package.
 *
 *   INVALID_CONFIG        - inconsistent or non-positive bounds; never retried
 *   UNKNOWN_LANGUAGE      - registry lookup miss
 *   ATTEMPTS_EXHAUSTED    - expected when constraints are too tight
 *   UNIQUE_EXHAUSTED      - batch could not collect enough distinct words
 *   FREQUENCY_UNAVAILABLE - frequency data missing; absorbed by the backend
 */

export type PseudolexErrorCode =
  | "INVALID_CONFIG"
  | "UNKNOWN_LANGUAGE"
  | "ATTEMPTS_EXHAUSTED"
  | "UNIQUE_EXHAUSTED"
  | "FREQUENCY_UNAVAILABLE";

export class PseudolexError extends Error {
  readonly code: PseudolexErrorCode;
  constructor(code: PseudolexErrorCode, message: string) {
    super(message);
    this.name = "PseudolexError";
    this.code = code;
  }
}

export class ConfigError extends PseudolexError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
  }
}

export class UnknownLanguageError extends PseudolexError {
  readonly language: string;
  readonly available: readonly string[];
  constructor(language: string, available: readonly string[]) {
    super("UNKNOWN_LANGUAGE", `Unknown language '${language}'. Available languages: ${available.join(", ")}.`);
    this.name = "UnknownLanguageError";
    this.language = language;
    this.available = available;
  }
}

export class AttemptsExhaustedError extends PseudolexError {
  readonly attempts: number;
  constructor(attempts: number) {
    super("ATTEMPTS_EXHAUSTED", `Unable to generate a non-word that satisfies the constraints after ${attempts} attempts.`);
    this.name = "AttemptsExhaustedError";
    this.attempts = attempts;
  }
}

export class UniqueWordsExhaustedError extends PseudolexError {
  readonly requested: number;
  readonly collected: number;
  constructor(requested: number, collected: number, draws: number) {
    super(
      "UNIQUE_EXHAUSTED",
      `Collected only ${collected} of ${requested} unique words after ${draws} draws; widen the length or syllable bounds.`
    );
    this.name = "UniqueWordsExhaustedError";
    this.requested = requested;
    this.collected = collected;
  }
}

export class FrequencyDataUnavailableError extends PseudolexError {
  readonly language: string;
  constructor(language: string, reason: string) {
    super("FREQUENCY_UNAVAILABLE", `No frequency data for language '${language}': ${reason}`);
    this.name = "FrequencyDataUnavailableError";
    this.language = language;
  }
}

export function isPseudolexError(e: unknown): e is PseudolexError {
  return e instanceof PseudolexError;
}
