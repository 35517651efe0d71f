/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */
import { isPseudolexError } from "@pseudolex/shared-types";
import type { CliIO } from "./io.js";

/**
 * Print a standardized error message and exit with status 1.
 *
 * @example
 * exitWithError(io, "Unknown language 'klingon'", [
 *   "Run: pseudolex languages"
 * ]);
 */
export function exitWithError(io: CliIO, title: string, nextSteps?: string[]): void {
  io.err(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    io.err("");
    for (const step of nextSteps) {
      io.err(`→ ${step}`);
    }
  }

  io.exit(1);
}

/** Maps generation failures to a message plus the flags most likely to fix them. */
export function reportError(io: CliIO, error: unknown): void {
  if (!isPseudolexError(error)) {
    exitWithError(io, error instanceof Error ? error.message : String(error));
    return;
  }

  switch (error.code) {
    case "UNKNOWN_LANGUAGE":
      exitWithError(io, error.message, ["Run: pseudolex languages"]);
      return;
    case "ATTEMPTS_EXHAUSTED":
      exitWithError(io, error.message, [
        "Widen --min-length/--max-length or --min-syllables/--max-syllables",
        "Try a lower --strictness",
      ]);
      return;
    case "UNIQUE_EXHAUSTED":
      exitWithError(io, error.message, ["Ask for fewer words with -n", "Widen the length or syllable bounds"]);
      return;
    case "INVALID_CONFIG":
    case "FREQUENCY_UNAVAILABLE":
      exitWithError(io, error.message);
      return;
  }
}
