/**
 * Sentences command - print pseudo-sentences, one per line
 */

import { Command } from "commander";
import { DEFAULT_PARAGRAPH_BOUNDS } from "@pseudolex/shared-types";
import { TextGenerator } from "@pseudolex/generator";
import type { CliIO } from "../utils/io.js";
import { reportError } from "../utils/errorFormatter.js";
import { addGeneratorOptions, createGenerator, parseInteger } from "./options.js";
import type { GeneratorCliOptions } from "./options.js";

interface SentencesOptions extends GeneratorCliOptions {
  sentences: number;
  minWords: number;
  maxWords: number;
}

export function sentencesCommand(io: CliIO): Command {
  return addGeneratorOptions(
    new Command("sentences")
      .description("Generate pseudo-sentences")
      .option("-n, --sentences <n>", "Number of sentences to generate", parseInteger, 5)
      .option("--min-words <n>", "Minimum words per sentence", parseInteger, DEFAULT_PARAGRAPH_BOUNDS.minWords)
      .option("--max-words <n>", "Maximum words per sentence", parseInteger, DEFAULT_PARAGRAPH_BOUNDS.maxWords)
  ).action((options: SentencesOptions) => {
    try {
      const generator = createGenerator(options);
      const text = new TextGenerator(generator, generator.random);
      for (const sentence of text.sentences(options.sentences, options.minWords, options.maxWords)) io.out(sentence);
    } catch (err) {
      reportError(io, err);
    }
  });
}
