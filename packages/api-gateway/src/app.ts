import { randomUUID } from "node:crypto";
import Fastify from "fastify";
import type { FastifyError } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { isPseudolexError } from "@pseudolex/shared-types";
import type { PseudolexErrorCode } from "@pseudolex/shared-types";
import { createDefaultRegistry } from "@pseudolex/languages";
import type { LanguageRegistry } from "@pseudolex/languages";

import { getConfig } from "./config/index.js";
import type { Config } from "./config/index.js";
import { healthRoutes } from "./routes/health.routes.js";
import { generateRoutes } from "./routes/generate.routes.js";

export interface BuildAppOptions {
  /** Defaults to the initialised process config */
  config?: Config;
  /** Defaults to the bundled languages wired to `config.dataDir` */
  registry?: LanguageRegistry;
  /** Language JSON files to load instead of the bundled ones; ignored when `registry` is given */
  languagesDir?: string;
}

const STATUS_BY_CODE: Record<PseudolexErrorCode, number> = {
  INVALID_CONFIG: 400,
  UNKNOWN_LANGUAGE: 404,
  ATTEMPTS_EXHAUSTED: 422,
  UNIQUE_EXHAUSTED: 422,
  FREQUENCY_UNAVAILABLE: 503,
};

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? getConfig();

  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    genReqId: () => randomUUID(),
    trustProxy: true,
    bodyLimit: 256 * 1024,
  });

  const registry = options.registry ?? createDefaultRegistry({
    ...(config.dataDir ? { dataDir: config.dataDir } : {}),
    ...(options.languagesDir ? { languagesDir: options.languagesDir } : {}),
    logger: fastify.log,
  });

  // ─── Error handlers ──────────────────────────────────────────────────────────
  // set before any plugin so every encapsulated context inherits them

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (isPseudolexError(error)) {
      const statusCode = STATUS_BY_CODE[error.code];
      request.log.warn({ err: error, code: error.code }, "generation request failed");
      void reply.code(statusCode).send({
        data: null,
        requestId: request.id,
        errors: [{ code: error.code, message: error.message }],
      });
      return;
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) fastify.log.error({ err: error, requestId: request.id }, "Unhandled error");
    void reply.code(statusCode).send({
      data: null,
      requestId: request.id,
      errors: [{
        code: error.code ?? "INTERNAL_ERROR",
        message: statusCode >= 500 ? "An internal server error occurred." : error.message,
      }],
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send({
      data: null,
      requestId: request.id,
      errors: [{ code: "NOT_FOUND", message: `${request.method} ${request.url} not found.` }],
    });
  });

  // ─── Plugins ────────────────────────────────────────────────────────────────

  await fastify.register(cors, {
    origin: (_origin, cb) => cb(null, true),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID", "Origin", "Accept"],
  });

  await fastify.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
    keyGenerator: (request) => `ip:${request.ip}`,
    // thrown by the plugin, so it goes through the error handler above
    errorResponseBuilder: (_request, context) => Object.assign(
      new Error(`Too many requests. Retry after ${Math.ceil(context.ttl / 1000)}s.`),
      { statusCode: 429, code: "RATE_LIMITED" }
    ),
  });

  // ─── OpenAPI ─────────────────────────────────────────────────────────────────

  await fastify.register(swagger, {
    openapi: {
      info: { title: "pseudolex API", description: "Pronounceable non-word generator", version: "0.4.0" },
    },
  });

  await fastify.register(swaggerUi, { routePrefix: "/docs", uiConfig: { deepLinking: true } });

  // ─── Routes ─────────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes, { registry, config });
  await fastify.register(generateRoutes, { registry, maxBatch: config.maxBatch });

  return fastify;
}
