import type { FastifyPluginAsync, FastifyReply } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { IdentityMissingError } from "@rankguard/core";
import type { Ladder } from "@rankguard/schemas";
import { CallerTargetBodySchema, StandingQuerySchema } from "../validation.js";
import { requireGroup } from "../utils/require-group.js";

export const ADMIN_GROUP = "admin";

const standingQueryJsonSchema = zodToJsonSchema(StandingQuerySchema, { target: "openApi3" });
const callerTargetJsonSchema = zodToJsonSchema(CallerTargetBodySchema, { target: "openApi3" });

export const standingRoutes: FastifyPluginAsync = async (app) => {
  function ladderFor(endpoint: string, reply: FastifyReply): Ladder | null {
    const ladder = app.admissionLadders.get(endpoint);
    if (!ladder) {
      reply.code(404).send({ error: `No admission ladder for endpoint "${endpoint}"`, statusCode: 404 });
      return null;
    }
    return ladder;
  }

  // GET /api/standing?endpoint= - The caller's own rank, block and counters
  app.get("/", {
    schema: {
      description: "Report the calling identity's admission standing on one endpoint.",
      tags: ["Standing"],
      querystring: standingQueryJsonSchema,
    },
  }, async (request, reply) => {
    const parsed = StandingQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.issues, statusCode: 400 });
    }
    const identity = request.callerIdentity;
    if (!identity) {
      throw new IdentityMissingError();
    }

    const ladder = ladderFor(parsed.data.endpoint, reply);
    if (!ladder) return reply;

    const standing = await app.admission.standing(identity, ladder, parsed.data.endpoint);
    return reply.code(200).send({ identity, endpoint: parsed.data.endpoint, standing });
  });

  // POST /api/standing/reset - Put another caller back on the first rank
  app.post("/reset", {
    schema: {
      description: "Reset a caller's rank on one endpoint. Admin only.",
      tags: ["Standing"],
      body: callerTargetJsonSchema,
    },
  }, async (request, reply) => {
    if (!requireGroup(request, reply, ADMIN_GROUP)) return reply;

    const parsed = CallerTargetBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues, statusCode: 400 });
    }
    const { endpoint, uniqueId, group } = parsed.data;
    if (!ladderFor(endpoint, reply)) return reply;

    const state = await app.admission.resetRank({ uniqueId, group }, endpoint);
    request.log.info({ endpoint, uniqueId, group, by: request.callerIdentity?.uniqueId }, "Rank reset");
    return reply.code(200).send({ endpoint, identity: { uniqueId, group }, state });
  });

  // POST /api/standing/pardon - Forget everything stored about a caller
  app.post("/pardon", {
    schema: {
      description: "Clear a caller's rank, block and counters on one endpoint. Admin only.",
      tags: ["Standing"],
      body: callerTargetJsonSchema,
    },
  }, async (request, reply) => {
    if (!requireGroup(request, reply, ADMIN_GROUP)) return reply;

    const parsed = CallerTargetBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues, statusCode: 400 });
    }
    const { endpoint, uniqueId, group } = parsed.data;
    const ladder = ladderFor(endpoint, reply);
    if (!ladder) return reply;

    await app.admission.pardon({ uniqueId, group }, ladder, endpoint);
    request.log.info({ endpoint, uniqueId, group, by: request.callerIdentity?.uniqueId }, "Caller pardoned");
    return reply.code(204).send();
  });
};
