/**
 * Pseudo-text built from generated words.
 *
 * A sentence is N words, the first capitalised, followed by one terminal
 * mark. A paragraph is M sentences joined by single spaces.
 */
import { ConfigError, DEFAULT_PARAGRAPH_BOUNDS } from "@pseudolex/shared-types";
import { choice, randInt } from "@pseudolex/phonology";
import type { RandomSource } from "@pseudolex/phonology";

export const PUNCTUATION: readonly string[] = [".", "!", "?"];

/** What the text layer needs from a word generator. */
export interface WordSource {
  generateMany(count: number, unique?: boolean): string[];
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function checkRange(label: string, min: number, max: number): void {
  if (min < 1 || max < min) throw new ConfigError(`${label} bounds are invalid (min=${min}, max=${max}).`);
}

function checkCount(count: number): void {
  if (count < 1) throw new ConfigError("count must be at least 1.");
}

export class TextGenerator {
  /**
   * Pass the word generator's own random source (`words.random`) to make
   * a seed reproduce the whole text.
   */
  constructor(private readonly words: WordSource, private readonly random: RandomSource) {}

  sentence(minWords: number = DEFAULT_PARAGRAPH_BOUNDS.minWords, maxWords: number = DEFAULT_PARAGRAPH_BOUNDS.maxWords): string {
    checkRange("Word count", minWords, maxWords);
    const words = this.words.generateMany(randInt(this.random, minWords, maxWords), false);
    const [first, ...rest] = words;
    if (first === undefined) return "";
    return [capitalize(first), ...rest].join(" ") + choice(this.random, PUNCTUATION);
  }

  sentences(
    count: number,
    minWords: number = DEFAULT_PARAGRAPH_BOUNDS.minWords,
    maxWords: number = DEFAULT_PARAGRAPH_BOUNDS.maxWords
  ): string[] {
    checkCount(count);
    return Array.from({ length: count }, () => this.sentence(minWords, maxWords));
  }

  paragraph(
    minSentences: number = DEFAULT_PARAGRAPH_BOUNDS.minSentences,
    maxSentences: number = DEFAULT_PARAGRAPH_BOUNDS.maxSentences,
    minWords: number = DEFAULT_PARAGRAPH_BOUNDS.minWords,
    maxWords: number = DEFAULT_PARAGRAPH_BOUNDS.maxWords
  ): string {
    checkRange("Sentence count", minSentences, maxSentences);
    return this.sentences(randInt(this.random, minSentences, maxSentences), minWords, maxWords).join(" ");
  }

  paragraphs(
    count: number,
    minSentences: number = DEFAULT_PARAGRAPH_BOUNDS.minSentences,
    maxSentences: number = DEFAULT_PARAGRAPH_BOUNDS.maxSentences,
    minWords: number = DEFAULT_PARAGRAPH_BOUNDS.minWords,
    maxWords: number = DEFAULT_PARAGRAPH_BOUNDS.maxWords
  ): string[] {
    checkCount(count);
    return Array.from({ length: count }, () => this.paragraph(minSentences, maxSentences, minWords, maxWords));
  }
}
