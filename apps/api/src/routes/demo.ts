import type { FastifyPluginAsync } from "fastify";
import type { LadderInput } from "@rankguard/schemas";

export const HELLO_ENDPOINT = "GET /api/hello";

/**
 * Anonymous callers must also space their requests out; a first breach
 * moves everyone to a stricter rank with a longer block.
 */
export const HELLO_LADDER: LadderInput = [
  [
    { hits: 5, windowMs: 10_000, blockMs: 10_000 },
    { delayMs: 200, blockMs: 5_000, groups: "anonymous", reason: "Slow down" },
  ],
  { hits: 2, windowMs: 10_000, blockMs: 60_000, message: "Repeated bursts are blocked for a minute" },
];

export const demoRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/hello - Rate-limited greeting
  app.get("/hello", {
    schema: {
      description: "Greeting behind the demo admission ladder.",
      tags: ["Demo"],
    },
    preHandler: app.admit(HELLO_ENDPOINT, HELLO_LADDER),
  }, async (request, reply) => {
    return reply.code(200).send({ message: "Hello", caller: request.callerIdentity?.uniqueId ?? null });
  });
};
