import { UnknownLanguageError } from "@pseudolex/shared-types";
import type { Logger } from "@pseudolex/shared-types";
import { FileWordListSource, ZipfTableLookup } from "@pseudolex/lexicon";
import { loadLanguageDirectory } from "./loader.js";
import { ProfileLanguagePlugin } from "./plugin.js";
import type { DictionarySources, LanguagePlugin } from "./plugin.js";

export const DEFAULT_LANGUAGE = "english";

// ─── Registry ─────────────────────────────────────────────────────────────────

/** Immutable name → plugin mapping. Built once, passed to whatever needs lookup. */
export class LanguageRegistry {
  private readonly plugins: ReadonlyMap<string, LanguagePlugin>;

  constructor(plugins: Iterable<readonly [string, LanguagePlugin]>) {
    this.plugins = new Map(plugins);
  }

  /** Case-insensitive. Throws UnknownLanguageError listing every registered name. */
  get(name: string = DEFAULT_LANGUAGE): LanguagePlugin {
    const plugin = this.plugins.get(name.toLowerCase());
    if (!plugin) throw new UnknownLanguageError(name, this.listNames());
    return plugin;
  }

  has(name: string): boolean {
    return this.plugins.has(name.toLowerCase());
  }

  listNames(): string[] {
    return [...this.plugins.keys()].sort();
  }

  get size(): number { return this.plugins.size; }
}

export class LanguageRegistryBuilder {
  private readonly plugins = new Map<string, LanguagePlugin>();

  /** Last registration under a name wins. */
  register(plugin: LanguagePlugin): this {
    this.plugins.set(plugin.name.toLowerCase(), plugin);
    return this;
  }

  build(): LanguageRegistry {
    return new LanguageRegistry(this.plugins);
  }
}

// ─── Bundled languages ────────────────────────────────────────────────────────

export interface DefaultRegistryOptions {
  /**
   * Root of the optional frequency tables and curated word lists.
   * Without it medium and stricter levels degrade to the builtin words.
   */
  dataDir?: string;
  /** Directory of language JSON files; the bundled set by default */
  languagesDir?: string;
  logger?: Logger;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): LanguageRegistry {
  const sources: DictionarySources = { logger: options.logger };
  if (options.dataDir) {
    sources.frequency = new ZipfTableLookup(options.dataDir);
    sources.wordList = new FileWordListSource(options.dataDir);
  }

  const builder = new LanguageRegistryBuilder();
  for (const data of loadLanguageDirectory(options.languagesDir)) {
    builder.register(new ProfileLanguagePlugin(data, sources));
  }
  const registry = builder.build();
  options.logger?.debug({ languages: registry.size, dataDir: options.dataDir ?? null }, "language registry built");
  return registry;
}

let defaultRegistry: LanguageRegistry | undefined;

/** Bundled languages, no external data. Built on first call. */
export function getDefaultRegistry(): LanguageRegistry {
  if (!defaultRegistry) defaultRegistry = createDefaultRegistry();
  return defaultRegistry;
}
