import type { LogLevel } from "@pseudolex/shared-types";

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, key: string, defaultValue = ""): string {
  return env[key] ?? defaultValue;
}

function intEnv(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return defaultValue;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  return value;
}

const ENVIRONMENTS = ["development", "staging", "production"] as const;
const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function oneOf<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find(a => a === value) ?? fallback;
}

export interface Config {
  readonly env: (typeof ENVIRONMENTS)[number];
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;

  /** Frequency tables and word lists; empty means builtin words only */
  readonly dataDir: string;

  // Rate limiting (in-memory)
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;

  /** Upper bound on `count` for every generation route */
  readonly maxBatch: number;
}

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = oneOf(ENVIRONMENTS, optionalEnv(env, "NODE_ENV", "development"), "development");

  return {
    env: nodeEnv,
    port: intEnv(env, "PORT", 3001),
    host: optionalEnv(env, "HOST", "0.0.0.0"),
    logLevel: oneOf(LOG_LEVELS, optionalEnv(env, "LOG_LEVEL"), nodeEnv === "production" ? "info" : "debug"),

    dataDir: optionalEnv(env, "PSEUDOLEX_DATA_DIR"),

    rateLimitMax: intEnv(env, "RATE_LIMIT_MAX", 100),
    rateLimitWindowMs: intEnv(env, "RATE_LIMIT_WINDOW_MS", 60_000),

    maxBatch: intEnv(env, "MAX_BATCH", 500),
  };
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) throw new Error("Config not initialized. Call initConfig() first.");
  return _config;
}

export function initConfig(env?: Env): Config {
  _config = loadConfig(env);
  return _config;
}
