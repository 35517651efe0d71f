/**
 * Paragraphs command - print pseudo-paragraphs separated by blank lines
 */

import { Command } from "commander";
import { DEFAULT_PARAGRAPH_BOUNDS } from "@pseudolex/shared-types";
import { TextGenerator } from "@pseudolex/generator";
import type { CliIO } from "../utils/io.js";
import { reportError } from "../utils/errorFormatter.js";
import { addGeneratorOptions, createGenerator, parseInteger } from "./options.js";
import type { GeneratorCliOptions } from "./options.js";

interface ParagraphsOptions extends GeneratorCliOptions {
  paragraphs: number;
  minSentences: number;
  maxSentences: number;
  minWords: number;
  maxWords: number;
}

export function paragraphsCommand(io: CliIO): Command {
  return addGeneratorOptions(
    new Command("paragraphs")
      .description("Generate pseudo-paragraphs")
      .option("-p, --paragraphs <n>", "Number of paragraphs to generate", parseInteger, 3)
      .option("--min-sentences <n>", "Minimum sentences per paragraph", parseInteger, DEFAULT_PARAGRAPH_BOUNDS.minSentences)
      .option("--max-sentences <n>", "Maximum sentences per paragraph", parseInteger, DEFAULT_PARAGRAPH_BOUNDS.maxSentences)
      .option("--min-words <n>", "Minimum words per sentence", parseInteger, DEFAULT_PARAGRAPH_BOUNDS.minWords)
      .option("--max-words <n>", "Maximum words per sentence", parseInteger, DEFAULT_PARAGRAPH_BOUNDS.maxWords)
  ).action((options: ParagraphsOptions) => {
    try {
      const generator = createGenerator(options);
      const text = new TextGenerator(generator, generator.random);
      const paragraphs = text.paragraphs(
        options.paragraphs, options.minSentences, options.maxSentences, options.minWords, options.maxWords
      );
      for (const paragraph of paragraphs) {
        io.out(paragraph);
        io.out("");
      }
    } catch (err) {
      reportError(io, err);
    }
  });
}
