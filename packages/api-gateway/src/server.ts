import { createLogger } from "@pseudolex/shared-types";
import type { Logger } from "@pseudolex/shared-types";

import { initConfig } from "./config/index.js";
import type { Config } from "./config/index.js";
import { buildApp } from "./app.js";
import type { BuildAppOptions } from "./app.js";

type App = Awaited<ReturnType<typeof buildApp>>;

export interface StartOptions extends Pick<BuildAppOptions, "registry" | "languagesDir"> {
  config?: Config;
  /** Reports failures that happen before the app logger exists */
  logger?: Logger;
  exit?: (code: number) => void;
}

function installShutdown(app: App, exit: (code: number) => void): void {
  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    app.log.info("Shutdown complete.");
    exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    app.log.error({ reason }, "Unhandled promise rejection");
    void shutdown("unhandledRejection");
  });
}

/**
 * Builds and starts the server. Any failure on the way up, bad language
 * data included, is logged and ends in `exit(1)`; resolves to null then.
 */
export async function startServer(options: StartOptions = {}): Promise<App | null> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let logger = options.logger ?? createLogger("pseudolex-api");
  let app: App | null = null;

  try {
    // 1. Load config from env (.env honoured)
    const config = options.config ?? initConfig();
    if (!options.logger) logger = createLogger("pseudolex-api", config.logLevel);

    // 2. Build the app; the language registry is loaded here, so bad data files fail fast
    app = await buildApp({
      config,
      ...(options.registry ? { registry: options.registry } : {}),
      ...(options.languagesDir ? { languagesDir: options.languagesDir } : {}),
    });

    await app.listen({ port: config.port, host: config.host });
    app.log.info(`pseudolex API running on ${config.host}:${config.port} [${config.env}]`);

    // 3. Graceful shutdown
    installShutdown(app, exit);
    return app;
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    if (app) await app.close();
    exit(1);
    return null;
  }
}
