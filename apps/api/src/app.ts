import Fastify from "fastify";
import type { FastifyError } from "fastify";
import type { Redis } from "ioredis";
import type { AdmissionMetrics, CounterStore, RankStore } from "@rankguard/core";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { loggerOptions } from "./logger.js";
import { createPromMetrics, metricsRoute } from "./metrics.js";
import { createAdmissionStores } from "./admission-state/index.js";
import { identityMiddleware, createIdentityResolver } from "./middleware/identity.js";
import { admissionMiddleware } from "./middleware/admission.js";
import { demoRoutes } from "./routes/demo.js";
import { standingRoutes } from "./routes/standing.js";
import { healthRoutes } from "./routes/health.js";
import { sanitizeErrorMessage, statusCodeForError } from "./utils/error-sanitizer.js";

declare module "fastify" {
  interface FastifyInstance {
    config: AppConfig;
    redis: Redis | null;
  }
}

export interface BuildServerOptions {
  config?: AppConfig;
  /** Stores to use instead of the ones the config selects. */
  stores?: { counterStore: CounterStore; rankStore: RankStore };
  metrics?: AdmissionMetrics;
  clock?: () => number;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const app = Fastify({
    logger: options.logger === false ? false : loggerOptions(config.logLevel),
  });

  // Global error handler: consistent error format, no internals leaked
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = statusCodeForError(error);
    const message = sanitizeErrorMessage(error, statusCode);

    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }

    return reply.code(statusCode).send({
      error: message,
      statusCode,
    });
  });

  const created = options.stores
    ? { ...options.stores, redis: null, close: async () => {} }
    : createAdmissionStores({
        redisUrl: config.redisUrl,
        keyPrefix: config.keyPrefix,
        cleanupIntervalMs: config.memoryCleanupIntervalMs,
      });
  const redis = created.redis;
  app.addHook("onClose", async () => {
    await created.close();
  });

  let metrics = options.metrics;
  if (!metrics) {
    const prom = createPromMetrics();
    metrics = prom.metrics;
    app.get("/metrics", metricsRoute(prom.registry));
  }

  app.decorate("config", config);
  app.decorate("redis", redis);

  await app.register(identityMiddleware, {
    resolver: createIdentityResolver({
      apiKeys: config.apiKeys,
      apiKeyGroups: config.apiKeyGroups,
      trustProxy: config.trustProxy,
    }),
  });
  await app.register(admissionMiddleware, {
    counterStore: created.counterStore,
    rankStore: created.rankStore,
    metrics,
    rankStateTtlMs: config.rankStateTtlMs,
    storeFailurePolicy: config.storeFailurePolicy,
    clock: options.clock,
  });

  // Health check
  app.get("/health", async () => ({
    status: "ok",
    store: redis ? "redis" : "in_memory",
    timestamp: new Date().toISOString(),
  }));

  // Register routes
  await app.register(demoRoutes, { prefix: "/api" });
  await app.register(standingRoutes, { prefix: "/api/standing" });
  await app.register(healthRoutes, { prefix: "/api/health" });

  return app;
}
