/**
 * Languages command - list the bundled languages
 */

import { Command } from "commander";
import { DEFAULT_LANGUAGE, getDefaultRegistry } from "@pseudolex/languages";
import type { CliIO } from "../utils/io.js";

export function languagesCommand(io: CliIO): Command {
  return new Command("languages")
    .description("List available languages")
    .option("-j, --json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      const registry = getDefaultRegistry();
      const languages = registry.listNames().map(name => ({ name, code: registry.get(name).code }));

      if (options.json) {
        io.out(JSON.stringify(languages, null, 2));
        return;
      }
      for (const { name, code } of languages) {
        io.out(`${name.padEnd(12)} ${code}${name === DEFAULT_LANGUAGE ? "  (default)" : ""}`);
      }
    });
}
