import type { FastifyInstance } from "fastify";
import type { LanguageRegistry } from "@pseudolex/languages";
import type { Config } from "../config/index.js";

export type HealthRouteOptions = {
  registry: LanguageRegistry;
  config: Config;
};

export async function healthRoutes(fastify: FastifyInstance, opts: HealthRouteOptions): Promise<void> {

  /** GET /health - liveness (always 200 if the process is running) */
  fastify.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      uptime: Math.floor(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  /** GET /health/ready - readiness (at least one language is registered) */
  fastify.get("/health/ready", async (_request, reply) => {
    if (opts.registry.size === 0) {
      return reply.code(503).send({ status: "error", reason: "no languages registered" });
    }
    return reply.send({
      status: "ok",
      languages: opts.registry.size,
      externalData: opts.config.dataDir !== "",
      rateLimit: `${opts.config.rateLimitMax} req / ${opts.config.rateLimitWindowMs / 1000}s`,
    });
  });
}
