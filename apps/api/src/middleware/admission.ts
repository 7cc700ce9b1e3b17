import type { FastifyPluginAsync, preHandlerAsyncHookHandler } from "fastify";
import fp from "fastify-plugin";
import { DecisionEngine, IdentityMissingError, StoreUnavailableError, compileLadder } from "@rankguard/core";
import type { CounterStore, RankStore, AdmissionMetrics, Logger } from "@rankguard/core";
import type { Ladder, LadderInput, Verdict } from "@rankguard/schemas";
import { rateLimitedBody, retryAfterSeconds } from "../utils/rate-limited-response.js";

export type StoreFailurePolicy = "closed" | "open";

declare module "fastify" {
  interface FastifyInstance {
    admission: DecisionEngine;
    /** Compiled ladders by endpoint key, filled in by `admit`. */
    admissionLadders: ReadonlyMap<string, Ladder>;
    /**
     * Compiles `ladder` once and returns a preHandler that admits or
     * rejects each request to `endpointKey`.
     */
    admit(endpointKey: string, ladder: LadderInput): preHandlerAsyncHookHandler;
  }
}

export interface AdmissionPluginOptions {
  counterStore: CounterStore;
  rankStore: RankStore;
  metrics?: AdmissionMetrics;
  rankStateTtlMs?: number;
  storeFailurePolicy?: StoreFailurePolicy;
  logger?: Logger;
  clock?: () => number;
}

const admissionPlugin: FastifyPluginAsync<AdmissionPluginOptions> = async (app, options) => {
  const policy = options.storeFailurePolicy ?? "closed";
  const engine = new DecisionEngine({
    counterStore: options.counterStore,
    rankStore: options.rankStore,
    metrics: options.metrics,
    rankStateTtlMs: options.rankStateTtlMs,
    clock: options.clock,
    logger: options.logger ?? app.log.child({ module: "admission" }),
  });
  const ladders = new Map<string, Ladder>();

  app.decorate("admission", engine);
  app.decorate("admissionLadders", ladders);
  app.decorate("admit", (endpointKey: string, ladderInput: LadderInput): preHandlerAsyncHookHandler => {
    const ladder = compileLadder(ladderInput);
    if (ladders.has(endpointKey)) {
      app.log.warn({ endpoint: endpointKey }, "Admission ladder registered twice, keeping the latest");
    }
    ladders.set(endpointKey, ladder);

    return async (request, reply) => {
      const identity = request.callerIdentity;
      if (!identity) {
        throw new IdentityMissingError();
      }

      let verdict: Verdict;
      try {
        verdict = await engine.evaluate(identity, ladder, endpointKey);
      } catch (err) {
        if (err instanceof StoreUnavailableError && policy === "open") {
          request.log.warn({ err, endpoint: endpointKey }, "Admission store unavailable, admitting request");
          return;
        }
        throw err;
      }

      if (verdict.outcome === "blocked") {
        return reply
          .code(429)
          .header("Retry-After", String(retryAfterSeconds(verdict)))
          .send(rateLimitedBody(verdict));
      }
    };
  });
};

export const admissionMiddleware = fp(admissionPlugin, {
  name: "admission-middleware",
  dependencies: ["identity-middleware"],
});
