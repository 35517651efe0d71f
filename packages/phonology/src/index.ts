/**
 * @pseudolex/phonology
 * Seeded random source, syllable-based candidate builder,
 * ugly-run heuristic, phonotactic profile validation.
 */
import alea from "alea";
import { ConfigError } from "@pseudolex/shared-types";
import type { PhonotacticProfile } from "@pseudolex/shared-types";

/** Uniform float in [0, 1). `Math.random` qualifies; so does an alea PRNG. */
export type RandomSource = () => number;

export interface ProfileValidationIssue {
  ruleId: string; severity: "error" | "warning"; message: string; entityRef?: string;
}

/** Builder-level retries before settling for an ugly candidate. */
export const MAX_PATTERN_ATTEMPTS = 8;

// ─── Random source ────────────────────────────────────────────────────────────

/**
 * Seeded PRNG. The same seed always replays the same sequence;
 * without one the generator is seeded from the clock.
 */
export function createRandom(seed?: number | string): RandomSource {
  const prng = alea(seed ?? `${Date.now()}-${Math.random()}`);
  return () => prng();
}

/** Integer in [min, max], both inclusive. */
export function randInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function choice<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[Math.min(items.length - 1, Math.floor(random() * items.length))];
  if (item === undefined) throw new ConfigError("Cannot choose from an empty list.");
  return item;
}

// ─── Ugly-pattern heuristic ───────────────────────────────────────────────────

/**
 * True for runs syllable concatenation produces by accident:
 * three identical characters in a row, "qq" or "yyy".
 * Same rule for every language.
 */
export function hasUglyPattern(word: string): boolean {
  const w = word.toLowerCase();
  if (w.length < 3) return false;
  for (let i = 0; i + 2 < w.length; i++) {
    if (w[i] === w[i + 1] && w[i + 1] === w[i + 2]) return true;
  }
  return w.includes("qq") || w.includes("yyy");
}

// ─── Candidate builder ────────────────────────────────────────────────────────

/**
 * Assemble one lowercase candidate of `minSyllables..maxSyllables` syllables
 * (onset + nucleus + coda each), never longer than `maxLength`.
 * Retries up to MAX_PATTERN_ATTEMPTS times to dodge ugly runs, then returns
 * the last candidate it built.
 */
export function buildCandidate(
  random: RandomSource,
  minSyllables: number,
  maxSyllables: number,
  maxLength: number,
  profile: PhonotacticProfile
): string {
  if (minSyllables < 1) throw new ConfigError("minSyllables must be at least 1.");
  if (minSyllables > maxSyllables) throw new ConfigError("minSyllables cannot exceed maxSyllables.");
  if (maxLength < 1) throw new ConfigError("maxLength must be at least 1.");

  let last = "";
  for (let attempt = 0; attempt < MAX_PATTERN_ATTEMPTS; attempt++) {
    const target = randInt(random, minSyllables, maxSyllables);
    const pieces: string[] = [];
    let length = 0;

    for (let s = 0; s < target; s++) {
      const syllable = choice(random, profile.onsets) + choice(random, profile.nuclei) + choice(random, profile.codas);
      const projected = length + syllable.length;
      // the first syllable is always kept, even when it alone overflows
      if (projected > maxLength && pieces.length > 0) break;
      pieces.push(syllable);
      length = projected;
      if (length >= maxLength) break;
    }

    let candidate = pieces.join("").toLowerCase();
    if (candidate.length > maxLength) candidate = candidate.slice(0, maxLength);
    if (!candidate) continue;

    last = candidate;
    if (!hasUglyPattern(candidate)) return candidate;
  }

  return last || choice(random, profile.nuclei).toLowerCase().slice(0, maxLength);
}

// ─── Profile validation ───────────────────────────────────────────────────────

export function validateProfile(profile: PhonotacticProfile): ProfileValidationIssue[] {
  const issues: ProfileValidationIssue[] = [];
  if (profile.onsets.length === 0)
    issues.push({ ruleId: "PHON_001", severity: "error", message: "Profile must contain at least one onset (use \"\" for none)." });
  if (profile.nuclei.length === 0)
    issues.push({ ruleId: "PHON_002", severity: "error", message: "Profile must contain at least one nucleus." });
  if (profile.codas.length === 0)
    issues.push({ ruleId: "PHON_003", severity: "error", message: "Profile must contain at least one coda (use \"\" for none)." });
  if (profile.nuclei.includes(""))
    issues.push({ ruleId: "PHON_004", severity: "error", message: "The empty string is not a valid nucleus." });
  for (const [slot, pieces] of [["onset", profile.onsets], ["nucleus", profile.nuclei], ["coda", profile.codas]] as const) {
    const seen = new Set<string>();
    for (const p of pieces) {
      if (seen.has(p)) issues.push({ ruleId: "PHON_005", severity: "warning", message: `Duplicate ${slot}: "${p}".`, entityRef: p });
      seen.add(p);
    }
  }
  return issues;
}
