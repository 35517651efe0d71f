/**
 * Words command - print non-words, one per line
 */

import { Command } from "commander";
import type { CliIO } from "../utils/io.js";
import { reportError } from "../utils/errorFormatter.js";
import { addGeneratorOptions, createGenerator, parseInteger } from "./options.js";
import type { GeneratorCliOptions } from "./options.js";

interface WordsOptions extends GeneratorCliOptions {
  count: number;
  unique: boolean;
  json?: boolean;
}

export function wordsCommand(io: CliIO): Command {
  return addGeneratorOptions(
    new Command("words")
      .description("Generate non-words (default)")
      .option("-n, --count <n>", "Number of words to generate", parseInteger, 10)
      .option("--no-unique", "Allow the same word more than once")
      .option("-j, --json", "Output as a JSON array")
  ).action((options: WordsOptions) => {
    try {
      const words = createGenerator(options).generateMany(options.count, options.unique);
      if (options.json) {
        io.out(JSON.stringify(words));
      } else {
        for (const word of words) io.out(word);
      }
    } catch (err) {
      reportError(io, err);
    }
  });
}
