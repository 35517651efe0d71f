/**
 * Language data files
 *
 * Each bundled language is one JSON file under packages/languages/data.
 * Files are validated twice: the zod schema checks shape, then
 * validateProfile checks the phonotactic rules. Either failing is a
 * ConfigError naming the file.
 */
import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "@pseudolex/shared-types";
import type { LanguageData } from "@pseudolex/shared-types";
import { validateProfile } from "@pseudolex/phonology";

export const BUNDLED_DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));

const LanguageDataSchema = z.object({
  name: z.string().min(1).transform(s => s.toLowerCase()),
  code: z.string().min(1),
  onsets: z.array(z.string()).min(1),
  nuclei: z.array(z.string()).min(1),
  codas: z.array(z.string()).min(1),
  commonWords: z.array(z.string().min(1)).default([]),
});

export function parseLanguageData(raw: unknown, source: string): LanguageData {
  const parsed = LanguageDataSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid language data in ${source}: ${detail}`);
  }

  const errors = validateProfile(parsed.data).filter(i => i.severity === "error");
  if (errors.length > 0) {
    throw new ConfigError(`Invalid language data in ${source}: ${errors.map(e => `[${e.ruleId}] ${e.message}`).join("; ")}`);
  }
  return parsed.data;
}

export function loadLanguageFile(path: string): LanguageData {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read language data ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseLanguageData(raw, path);
}

/** Every *.json file in `dir`, in file-name order. */
export function loadLanguageDirectory(dir: string = BUNDLED_DATA_DIR): LanguageData[] {
  return readdirSync(dir)
    .filter(f => f.endsWith(".json"))
    .sort()
    .map(f => loadLanguageFile(join(dir, f)));
}
