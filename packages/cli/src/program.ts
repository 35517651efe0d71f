/**
 * @pseudolex/cli - command tree, kept apart from the entry point so tests
 * can parse argv against captured output.
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { wordsCommand } from "./commands/words.js";
import { sentencesCommand } from "./commands/sentences.js";
import { paragraphsCommand } from "./commands/paragraphs.js";
import { languagesCommand } from "./commands/languages.js";
import { consoleIO } from "./utils/io.js";
import type { CliIO } from "./utils/io.js";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));

export function buildProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name("pseudolex")
    .description("Generate pronounceable non-words, sentences and paragraphs")
    .version(pkg.version);

  program.addCommand(wordsCommand(io), { isDefault: true });
  program.addCommand(sentencesCommand(io));
  program.addCommand(paragraphsCommand(io));
  program.addCommand(languagesCommand(io));

  return program;
}

export type { CliIO } from "./utils/io.js";
