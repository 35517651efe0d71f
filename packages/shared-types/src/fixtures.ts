/**
 * Fixture profiles used across package tests.
 *
 *   1. Plovan   - CV(C) profile with single-letter pieces, easy to reason about
 *   2. Ooze     - every draw collides into a triple run ("ooo"), always ugly
 *   3. Lone     - one onset, one nucleus, one coda; fully deterministic output
 */

import type { LanguageData, PhonotacticProfile } from "./schema.js";

// ─── Fixture 1: Plovan ───────────────────────────────────────────────────────

export const FIXTURE_PLOVAN: LanguageData = {
  name: "plovan",
  code: "plv",
  onsets: ["", "p", "t", "k", "s", "n", "l", "m", "r"],
  nuclei: ["a", "e", "i", "o", "u"],
  codas: ["", "n", "s", "r"],
  commonWords: ["pala", "meso", "ru", "mesa"],
};

// ─── Fixture 2: Ooze ─────────────────────────────────────────────────────────

export const FIXTURE_OOZE: PhonotacticProfile = {
  onsets: ["o"],
  nuclei: ["oo"],
  codas: ["z"],
};

// ─── Fixture 3: Lone ─────────────────────────────────────────────────────────

export const FIXTURE_LONE: PhonotacticProfile = {
  onsets: ["br"],
  nuclei: ["a"],
  codas: ["nt"],
};

// ─── Random helpers ──────────────────────────────────────────────────────────

/**
 * A RandomSource that replays `values` in a loop.
 * Values must lie in [0, 1).
 */
export function sequenceRandom(values: readonly number[]): () => number {
  let i = 0;
  return () => {
    const v = values[i % values.length] ?? 0;
    i++;
    return v;
  };
}
