import { ConfigError } from "@pseudolex/shared-types";
import type { ParagraphBounds, WordBounds } from "@pseudolex/shared-types";

/** Any subset of the user-facing bounds; only complete pairs are checked. */
export type GenerationConfig = Partial<WordBounds & ParagraphBounds>;

const RANGES: ReadonlyArray<readonly [label: string, min: keyof GenerationConfig, max: keyof GenerationConfig]> = [
  ["Word length", "minLength", "maxLength"],
  ["Syllables per word", "minSyllables", "maxSyllables"],
  ["Words per sentence", "minWords", "maxWords"],
  ["Sentences per paragraph", "minSentences", "maxSentences"],
];

function rangeErrors(label: string, min: number, max: number): string[] {
  const errors: string[] = [];
  if (min < 0 || max < 0) errors.push(`${label}: values must be non-negative (got min=${min}, max=${max}).`);
  if (min > max) errors.push(`${label}: min value ${min} cannot be greater than max value ${max}.`);
  return errors;
}

/**
 * Report every inconsistent range at once, for callers that collect
 * settings from a form or a command line before building a generator.
 */
export function validateConfig(cfg: GenerationConfig): void {
  const errors: string[] = [];
  for (const [label, minKey, maxKey] of RANGES) {
    const min = cfg[minKey];
    const max = cfg[maxKey];
    if (min === undefined || max === undefined) continue;
    errors.push(...rangeErrors(label, Math.trunc(min), Math.trunc(max)));
  }
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration:\n\n${errors.map(e => `- ${e}`).join("\n")}`);
  }
}
