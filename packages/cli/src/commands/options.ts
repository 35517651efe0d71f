/**
 * Flags shared by every generating command, and the generator they build.
 */
import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError, Option } from "commander";
import { STRICTNESS_LEVELS, DEFAULT_REAL_WORD_MIN_ZIPF, DEFAULT_WORD_BOUNDS, createLogger } from "@pseudolex/shared-types";
import type { LogLevel, Strictness } from "@pseudolex/shared-types";
import { DEFAULT_LANGUAGE, createDefaultRegistry } from "@pseudolex/languages";
import { WordGenerator, validateConfig } from "@pseudolex/generator";
import type { GenerationConfig } from "@pseudolex/generator";

export interface GeneratorCliOptions {
  minLength: number;
  maxLength: number;
  minSyllables: number;
  maxSyllables: number;
  strictness: Strictness;
  allowRealWords?: boolean;
  seed?: number;
  language: string;
  dataDir?: string;
  knownWords?: string;
  ban?: string[];
  minZipf: number;
  logLevel: LogLevel;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError("Not an integer.");
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) throw new InvalidArgumentError("Not a number.");
  return parsed;
}

export function addGeneratorOptions(command: Command): Command {
  return command
    .option("--min-length <n>", "Minimum length of generated words", parseInteger, DEFAULT_WORD_BOUNDS.minLength)
    .option("--max-length <n>", "Maximum length of generated words", parseInteger, DEFAULT_WORD_BOUNDS.maxLength)
    .option("--min-syllables <n>", "Minimum syllable count", parseInteger, DEFAULT_WORD_BOUNDS.minSyllables)
    .option("--max-syllables <n>", "Maximum syllable count", parseInteger, DEFAULT_WORD_BOUNDS.maxSyllables)
    .addOption(new Option("--strictness <level>", "Real-word filtering level").choices(STRICTNESS_LEVELS).default("medium"))
    .option("--allow-real-words", "Let real words through")
    .option("--seed <n>", "Seed for reproducible output", parseInteger)
    .option("--language <name>", "Language to generate", DEFAULT_LANGUAGE)
    .addOption(new Option("--data-dir <path>", "Directory with frequency/ and wordlists/ data").env("PSEUDOLEX_DATA_DIR"))
    .option("--known-words <file>", "File of extra words to treat as real, one per line")
    .option("--ban <words...>", "Words never to output")
    .option("--min-zipf <value>", "Frequency above which a word counts as real", parseNumber, DEFAULT_REAL_WORD_MIN_ZIPF)
    .addOption(
      new Option("--log-level <level>", "Diagnostics on stderr")
        .choices(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .default("warn")
    );
}

function readWordFile(path: string): string[] {
  return readFileSync(path, "utf8")
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l.length > 0 && !l.startsWith("#"));
}

/**
 * Checks every bound in `options` (text bounds included) before anything
 * is built. Throws ConfigError or UnknownLanguageError.
 */
export function createGenerator(options: GeneratorCliOptions & GenerationConfig): WordGenerator {
  validateConfig(options);

  const logger = createLogger("pseudolex", options.logLevel);
  const registry = createDefaultRegistry({
    ...(options.dataDir ? { dataDir: options.dataDir } : {}),
    logger,
  });

  const generator = new WordGenerator({
    languagePlugin: registry.get(options.language),
    minLength: options.minLength,
    maxLength: options.maxLength,
    minSyllables: options.minSyllables,
    maxSyllables: options.maxSyllables,
    strictness: options.strictness,
    allowRealWords: options.allowRealWords ?? false,
    bannedWords: options.ban ?? [],
    knownWords: options.knownWords ? readWordFile(options.knownWords) : [],
    seed: options.seed,
    realWordMinZipf: options.minZipf,
    logger,
  });

  logger.debug({ language: generator.plugin.name, strictness: generator.strictness, seed: options.seed ?? null }, "generator ready");
  return generator;
}
