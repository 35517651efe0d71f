/**
 * File-backed data sources for the optional backends.
 *
 * Layout under a data directory:
 *   frequency/<code>.tsv   one "word<TAB>zipf" pair per line
 *   wordlists/<code>.txt   one word per line
 *
 * Lines that are blank or start with "#" are skipped.
 */
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { FrequencyDataUnavailableError } from "@pseudolex/shared-types";
import type { FrequencyLookup, WordListSource } from "./index.js";

function readLines(path: string): string[] {
  return readFileSync(path, "utf8")
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l.length > 0 && !l.startsWith("#"));
}

// ─── Frequency tables ─────────────────────────────────────────────────────────

/**
 * Loads one table per language on first use and keeps it for the
 * lifetime of the lookup. Unknown words score 0.
 */
export class ZipfTableLookup implements FrequencyLookup {
  private readonly tables = new Map<string, ReadonlyMap<string, number>>();

  constructor(private readonly dataDir: string) {}

  zipfFrequency(word: string, language: string): number {
    return this.table(language).get(word.toLowerCase()) ?? 0;
  }

  private table(language: string): ReadonlyMap<string, number> {
    const cached = this.tables.get(language);
    if (cached) return cached;

    const path = join(this.dataDir, "frequency", `${language}.tsv`);
    if (!existsSync(path)) throw new FrequencyDataUnavailableError(language, `${path} not found`);

    const table = new Map<string, number>();
    for (const line of readLines(path)) {
      const [word, score] = line.split("\t");
      if (!word || score === undefined) continue;
      const zipf = Number.parseFloat(score);
      if (Number.isNaN(zipf)) continue;
      table.set(word.toLowerCase(), zipf);
    }
    this.tables.set(language, table);
    return table;
  }
}

// ─── Curated word lists ───────────────────────────────────────────────────────

export class FileWordListSource implements WordListSource {
  constructor(private readonly dataDir: string) {}

  load(language: string): readonly string[] | null {
    const path = join(this.dataDir, "wordlists", `${language}.txt`);
    if (!existsSync(path)) return null;
    return readLines(path);
  }
}
