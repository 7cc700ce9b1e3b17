import type { FastifyPluginAsync } from "fastify";
import { sanitizeHealthError } from "../utils/error-sanitizer.js";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/health/deep - Store connectivity
  app.get("/deep", {
    schema: {
      description: "Deep health check: admission store connectivity.",
      tags: ["Health"],
    },
  }, async (_request, reply) => {
    const checks: Record<string, { status: string; latencyMs: number; error?: string }> = {};
    let allHealthy = true;

    const redisStart = Date.now();
    try {
      if (app.redis) {
        await app.redis.ping();
        checks["redis"] = { status: "connected", latencyMs: Date.now() - redisStart };
      } else {
        checks["redis"] = { status: "in_memory", latencyMs: 0 };
      }
    } catch (err) {
      checks["redis"] = { status: "disconnected", latencyMs: Date.now() - redisStart, error: sanitizeHealthError(err) };
      allHealthy = false;
    }

    return reply.code(allHealthy ? 200 : 503).send({
      healthy: allHealthy,
      checks,
      checkedAt: new Date().toISOString(),
    });
  });
};
