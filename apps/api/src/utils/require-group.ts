import type { FastifyRequest, FastifyReply } from "fastify";
import { IdentityMissingError } from "@rankguard/core";

/**
 * Group-based access guard for admin routes. Sends 403 and returns false
 * when the caller is outside every listed group.
 */
export function requireGroup(request: FastifyRequest, reply: FastifyReply, ...groups: string[]): boolean {
  const identity = request.callerIdentity;
  if (!identity) {
    throw new IdentityMissingError();
  }

  if (!groups.includes(identity.group)) {
    reply.code(403).send({
      error: `Forbidden: requires one of [${groups.join(", ")}]`,
      statusCode: 403,
    });
    return false;
  }

  return true;
}
