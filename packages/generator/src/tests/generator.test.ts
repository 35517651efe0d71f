/**
 * WordGenerator tests
 * Self-contained test runner - no external test framework dependencies.
 */

import { WordGenerator, buildDictionaryForStrictness } from "../index.js";
import type { LanguagePlugin } from "@pseudolex/languages";
import { LanguageRegistryBuilder, ProfileLanguagePlugin, getDefaultRegistry } from "@pseudolex/languages";
import { BuiltinCommonWordsDictionary, StaticWordSetDictionary } from "@pseudolex/lexicon";
import type { DictionaryBackend } from "@pseudolex/lexicon";
import type { RandomSource } from "@pseudolex/phonology";
import {
  AttemptsExhaustedError, ConfigError, UniqueWordsExhaustedError, UnknownLanguageError, FIXTURE_PLOVAN,
  createLogger, sequenceRandom,
} from "@pseudolex/shared-types";
import type { Strictness } from "@pseudolex/shared-types";

// ─── Mini test runner ─────────────────────────────────────────────────────────

let passed = 0; let failed = 0;
const failures: string[] = [];

function test(name: string, fn: () => void): void {
  try { fn(); passed++; console.log(`  ✓ ${name}`); }
  catch (e: unknown) {
    failed++;
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`  ✗ ${name}\n    ${msg}`);
    failures.push(`${name}: ${msg}`);
  }
}

function eq<T>(actual: T, expected: T, msg?: string): void {
  if (actual !== expected) throw new Error(msg ?? `Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
}

function ok(val: unknown, msg?: string): void {
  if (!val) throw new Error(msg ?? `Expected truthy, got ${JSON.stringify(val)}`);
}

function throws<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try { fn(); } catch (e) {
    if (e instanceof type) return e;
    throw new Error(`Expected ${type.name}, got ${String(e)}`);
  }
  throw new Error(`Expected ${type.name}, nothing thrown`);
}

// ─── Stubs ────────────────────────────────────────────────────────────────────

interface CandidateCall { random: RandomSource; minSyllables: number; maxSyllables: number; maxLength: number }

/** Replays `words` in a loop and records every call. */
function scriptedPlugin(words: readonly string[], dictionary: DictionaryBackend = { isRealWord: () => false }) {
  const calls: CandidateCall[] = [];
  const dictionaryRequests: Array<{ strictness: Strictness; minZipf: number }> = [];
  const plugin: LanguagePlugin = {
    name: "scripted",
    code: "sc",
    buildCandidate(random, minSyllables, maxSyllables, maxLength) {
      calls.push({ random, minSyllables, maxSyllables, maxLength });
      return words[(calls.length - 1) % words.length] ?? "";
    },
    buildDictionary(strictness, minZipf) {
      dictionaryRequests.push({ strictness, minZipf });
      return dictionary;
    },
  };
  return { plugin, calls, dictionaryRequests };
}

const alwaysReal: DictionaryBackend = { isRealWord: () => true };

// ─── Construction ─────────────────────────────────────────────────────────────

console.log("\n── Construction ──");

test("Defaults are 4–10 letters, 1–3 syllables, medium, real words rejected", () => {
  const g = new WordGenerator({ languagePlugin: scriptedPlugin(["alpha"]).plugin });
  eq(g.minLength, 4);
  eq(g.maxLength, 10);
  eq(g.minSyllables, 1);
  eq(g.maxSyllables, 3);
  eq(g.strictness, "medium");
  eq(g.allowRealWords, false);
});

test("Inconsistent bounds are config errors", () => {
  const { plugin } = scriptedPlugin(["alpha"]);
  throws(() => new WordGenerator({ languagePlugin: plugin, minLength: 0 }), ConfigError);
  throws(() => new WordGenerator({ languagePlugin: plugin, minLength: 6, maxLength: 5 }), ConfigError);
  throws(() => new WordGenerator({ languagePlugin: plugin, minSyllables: 0 }), ConfigError);
  throws(() => new WordGenerator({ languagePlugin: plugin, minSyllables: 3, maxSyllables: 2 }), ConfigError);
});

test("NaN and fractional bounds fail at construction", () => {
  const { plugin } = scriptedPlugin(["alpha"]);
  eq(throws(() => new WordGenerator({ languagePlugin: plugin, minLength: NaN }), ConfigError).message, "minLength must be an integer, got NaN.");
  eq(throws(() => new WordGenerator({ languagePlugin: plugin, maxLength: 7.5 }), ConfigError).message, "maxLength must be an integer, got 7.5.");
  eq(throws(() => new WordGenerator({ languagePlugin: plugin, minSyllables: NaN }), ConfigError).message, "minSyllables must be an integer, got NaN.");
  eq(
    throws(() => new WordGenerator({ languagePlugin: plugin, maxSyllables: Infinity }), ConfigError).message,
    "maxSyllables must be an integer, got Infinity."
  );
});

test("Unknown language fails at construction", () => {
  const e = throws(() => new WordGenerator({ language: "klingon" }), UnknownLanguageError);
  ok(e.available.includes("english"));
});

test("Language is resolved through the given registry", () => {
  const { plugin } = scriptedPlugin(["alpha"]);
  const registry = new LanguageRegistryBuilder().register(plugin).build();
  eq(new WordGenerator({ language: "Scripted", registry }).plugin, plugin);
});

test("Dictionary comes from the plugin at the chosen strictness and threshold", () => {
  const { plugin, dictionaryRequests } = scriptedPlugin(["alpha"]);
  new WordGenerator({ languagePlugin: plugin, strictness: "very_strict", realWordMinZipf: 3.5 });
  eq(dictionaryRequests.length, 1);
  eq(dictionaryRequests[0]?.strictness, "very_strict");
  eq(dictionaryRequests[0]?.minZipf, 3.5);
});

test("An explicit dictionary bypasses the plugin chain", () => {
  const { plugin, dictionaryRequests } = scriptedPlugin(["alpha"]);
  const dictionary = new StaticWordSetDictionary(["alpha"]);
  eq(new WordGenerator({ languagePlugin: plugin, dictionary }).dictionary, dictionary);
  eq(dictionaryRequests.length, 0);
});

test("knownWords are rejected alongside the dictionary", () => {
  const { plugin } = scriptedPlugin(["glow", "brim", "snarp"], new StaticWordSetDictionary(["glow"]));
  eq(new WordGenerator({ languagePlugin: plugin, knownWords: ["Brim"] }).generateOne(), "snarp");
});

test("An empty knownWords list leaves the dictionary as is", () => {
  const dictionary = new StaticWordSetDictionary(["glow"]);
  const { plugin } = scriptedPlugin(["alpha"], dictionary);
  eq(new WordGenerator({ languagePlugin: plugin, knownWords: [] }).dictionary, dictionary);
});

// ─── generateOne ──────────────────────────────────────────────────────────────

console.log("\n── generateOne ──");

test("Bounds and random source are forwarded to the plugin", () => {
  const { plugin, calls } = scriptedPlugin(["alpha"]);
  const random = sequenceRandom([0.5]);
  const g = new WordGenerator({ languagePlugin: plugin, random, minSyllables: 2, maxSyllables: 4, maxLength: 8 });
  g.generateOne();
  eq(calls.length, 1);
  eq(calls[0]?.random, random);
  eq(calls[0]?.minSyllables, 2);
  eq(calls[0]?.maxSyllables, 4);
  eq(calls[0]?.maxLength, 8);
});

test("Candidates outside the length bounds are rejected", () => {
  const { plugin, calls } = scriptedPlugin(["abc", "abcdefghijk", "abcd"]);
  eq(new WordGenerator({ languagePlugin: plugin }).generateOne(), "abcd");
  eq(calls.length, 3);
});

test("Banned words are rejected case-insensitively", () => {
  const { plugin } = scriptedPlugin(["alpha", "beta"]);
  eq(new WordGenerator({ languagePlugin: plugin, bannedWords: ["ALPHA"] }).generateOne(), "beta");
});

test("Real words are rejected", () => {
  const { plugin } = scriptedPlugin(["glow", "snarp"]);
  const dictionary = new StaticWordSetDictionary(["glow"]);
  eq(new WordGenerator({ languagePlugin: plugin, dictionary }).generateOne(), "snarp");
});

test("Always-real dictionary exhausts the attempt budget", () => {
  const { plugin, calls } = scriptedPlugin(["alpha"], alwaysReal);
  const g = new WordGenerator({ languagePlugin: plugin });
  const e = throws(() => g.generateOne(50), AttemptsExhaustedError);
  eq(e.attempts, 50);
  eq(e.message, "Unable to generate a non-word that satisfies the constraints after 50 attempts.");
  eq(calls.length, 50);
});

test("allowRealWords returns on the first attempt", () => {
  const { plugin, calls } = scriptedPlugin(["alpha"], alwaysReal);
  eq(new WordGenerator({ languagePlugin: plugin, allowRealWords: true }).generateOne(50), "alpha");
  eq(calls.length, 1);
});

test("Exhaustion is logged with rejection counts", () => {
  const lines: Array<{ level: number; rejected?: { length: number; banned: number; real: number } }> = [];
  const logger = createLogger("generator-test", "debug", { write(line: string) { lines.push(JSON.parse(line)); } });
  const { plugin } = scriptedPlugin(["abc", "alpha"], alwaysReal);
  throws(() => new WordGenerator({ languagePlugin: plugin, logger }).generateOne(4), AttemptsExhaustedError);
  eq(lines.length, 1);
  eq(lines[0]?.level, 40);
  eq(lines[0]?.rejected?.length, 2);
  eq(lines[0]?.rejected?.real, 2);
});

test("maxAttempts below 1 is a config error", () => {
  throws(() => new WordGenerator({ languagePlugin: scriptedPlugin(["alpha"]).plugin }).generateOne(0), ConfigError);
  throws(() => new WordGenerator({ languagePlugin: scriptedPlugin(["alpha"]).plugin }).generateOne(NaN), ConfigError);
});

// ─── generateMany ─────────────────────────────────────────────────────────────

console.log("\n── generateMany ──");

test("Unique batches skip repeats and keep generation order", () => {
  const { plugin } = scriptedPlugin(["alpha", "beta", "alpha", "gamma"]);
  eq(new WordGenerator({ languagePlugin: plugin }).generateMany(3).join(","), "alpha,beta,gamma");
});

test("Non-unique batches keep repeats", () => {
  const { plugin } = scriptedPlugin(["alpha", "beta", "alpha", "gamma"]);
  eq(new WordGenerator({ languagePlugin: plugin }).generateMany(3, false).join(","), "alpha,beta,alpha");
});

test("Unique batch gives up after maxDraws", () => {
  const { plugin, calls } = scriptedPlugin(["alpha"]);
  const e = throws(() => new WordGenerator({ languagePlugin: plugin }).generateMany(2, true, 10), UniqueWordsExhaustedError);
  eq(e.requested, 2);
  eq(e.collected, 1);
  eq(calls.length, 10);
});

test("Default draw cap is max(1000, count × 100)", () => {
  const { plugin, calls } = scriptedPlugin(["alpha"]);
  throws(() => new WordGenerator({ languagePlugin: plugin }).generateMany(2), UniqueWordsExhaustedError);
  eq(calls.length, 1000);
});

test("count below 1 is a config error", () => {
  throws(() => new WordGenerator({ languagePlugin: scriptedPlugin(["alpha"]).plugin }).generateMany(0), ConfigError);
  throws(() => new WordGenerator({ languagePlugin: scriptedPlugin(["alpha"]).plugin }).generateMany(NaN), ConfigError);
  throws(() => new WordGenerator({ languagePlugin: scriptedPlugin(["alpha"]).plugin }).generateMany(2.5), ConfigError);
});

// ─── Bundled languages ────────────────────────────────────────────────────────

console.log("\n── Bundled languages ──");

test("Seed 123, English, loose: a lowercase non-word of 4–10 letters", () => {
  const english = getDefaultRegistry().get("english");
  ok(english instanceof ProfileLanguagePlugin);
  const builtin = new BuiltinCommonWordsDictionary(english instanceof ProfileLanguagePlugin ? english.commonWords : []);
  const g = new WordGenerator({
    minLength: 4, maxLength: 10, minSyllables: 1, maxSyllables: 3,
    strictness: "loose", allowRealWords: false, seed: 123, language: "english",
  });
  const word = g.generateOne();
  ok(/^[a-z]+$/.test(word), `not lowercase ascii: ${word}`);
  ok(word.length >= 4 && word.length <= 10, `bad length: ${word}`);
  eq(builtin.isRealWord(word), false);
});

test("Same seed, same words", () => {
  const a = new WordGenerator({ seed: 123, strictness: "loose" }).generateMany(20);
  const b = new WordGenerator({ seed: 123, strictness: "loose" }).generateMany(20);
  eq(a.join(","), b.join(","));
});

test("Every word respects its bounds and the ban list", () => {
  const registry = new LanguageRegistryBuilder().register(new ProfileLanguagePlugin(FIXTURE_PLOVAN)).build();
  const g = new WordGenerator({
    registry, language: "plovan", seed: "bounds", minLength: 3, maxLength: 6, strictness: "loose",
    bannedWords: ["pana", "tesa"],
  });
  for (const word of g.generateMany(40)) {
    ok(word.length >= 3 && word.length <= 6, `bad length: ${word}`);
    ok(word !== "pana" && word !== "tesa", `banned word returned: ${word}`);
    ok(!FIXTURE_PLOVAN.commonWords.includes(word), `common word returned: ${word}`);
  }
});

test("Unique batches from a real profile have no duplicates", () => {
  const words = new WordGenerator({ seed: 7, strictness: "loose" }).generateMany(50);
  eq(words.length, 50);
  eq(new Set(words).size, 50);
});

// ─── buildDictionaryForStrictness ─────────────────────────────────────────────

console.log("\n── buildDictionaryForStrictness ──");

test("Defaults to the English chain", () => {
  const d = buildDictionaryForStrictness("loose");
  eq(d.isRealWord("The"), true);
  eq(d.isRealWord("snarp"), false);
});

test("An explicit plugin wins over the language name", () => {
  const dictionary = new StaticWordSetDictionary(["glow"]);
  const { plugin, dictionaryRequests } = scriptedPlugin(["alpha"], dictionary);
  eq(buildDictionaryForStrictness("strict", 2.2, { plugin, language: "english" }), dictionary);
  eq(dictionaryRequests[0]?.strictness, "strict");
  eq(dictionaryRequests[0]?.minZipf, 2.2);
});

test("Unknown language is reported", () => {
  throws(() => buildDictionaryForStrictness("medium", 2.7, { language: "klingon" }), UnknownLanguageError);
});

// ─── Results ──────────────────────────────────────────────────────────────────

console.log(`\n${"═".repeat(50)}`);
console.log(`Generator Tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  console.error("\nFailed tests:");
  failures.forEach(f => console.error(`  ✗ ${f}`));
  throw new Error("Tests failed");
}
