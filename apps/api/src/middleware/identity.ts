import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import crypto from "node:crypto";
import type { CallerIdentity } from "@rankguard/schemas";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the identity plugin; null when the caller could not be identified. */
    callerIdentity: CallerIdentity | null;
  }
}

export const AUTHENTICATED_GROUP = "authenticated";
export const ANONYMOUS_GROUP = "anonymous";

interface HashedKeyEntry {
  hash: Buffer;
  group: string;
}

export interface IdentityResolverOptions {
  apiKeys: string[];
  apiKeyGroups: Map<string, string>;
  trustProxy: boolean;
}

export interface IdentitySource {
  authorization?: string;
  forwardedFor?: string | string[];
  remoteAddress: string;
}

export type IdentityResolver = (source: IdentitySource) => CallerIdentity | null;

function hashKey(key: string): Buffer {
  return crypto.createHash("sha256").update(key).digest();
}

/**
 * Maps a request to the identity its admission state is kept under.
 *
 * Bearer keys are SHA-256 hashed on load. Incoming keys are hashed and
 * compared with a timing-safe comparison; the caller id is a prefix of the
 * hash so raw keys never reach the store. An unknown key resolves to no
 * identity. Requests without an Authorization header are keyed by client
 * address in the anonymous group.
 */
export function createIdentityResolver(options: IdentityResolverOptions): IdentityResolver {
  const entries: HashedKeyEntry[] = options.apiKeys.map((key) => ({
    hash: hashKey(key),
    group: options.apiKeyGroups.get(key) ?? AUTHENTICATED_GROUP,
  }));

  return (source) => {
    if (source.authorization === undefined) {
      return { uniqueId: `ip:${clientAddress(source, options.trustProxy)}`, group: ANONYMOUS_GROUP };
    }

    const match = /^Bearer\s+(.+)$/i.exec(source.authorization);
    if (!match?.[1]) return null;

    const incomingHash = hashKey(match[1]);
    for (const entry of entries) {
      if (entry.hash.length === incomingHash.length && crypto.timingSafeEqual(entry.hash, incomingHash)) {
        return { uniqueId: `key:${incomingHash.toString("hex").slice(0, 16)}`, group: entry.group };
      }
    }
    return null;
  };
}

function clientAddress(source: IdentitySource, trustProxy: boolean): string {
  if (trustProxy && source.forwardedFor !== undefined) {
    const header = Array.isArray(source.forwardedFor) ? source.forwardedFor[0] : source.forwardedFor;
    const firstHop = header?.split(",")[0]?.trim();
    if (firstHop) return firstHop;
  }
  return source.remoteAddress;
}

export function identitySource(request: FastifyRequest): IdentitySource {
  return {
    authorization: request.headers.authorization,
    forwardedFor: request.headers["x-forwarded-for"],
    remoteAddress: request.ip,
  };
}

export interface IdentityPluginOptions {
  resolver: IdentityResolver;
}

const identityPlugin: FastifyPluginAsync<IdentityPluginOptions> = async (app, options) => {
  app.decorateRequest("callerIdentity", null);

  app.addHook("onRequest", async (request) => {
    request.callerIdentity = options.resolver(identitySource(request));
  });
};

export const identityMiddleware = fp(identityPlugin, { name: "identity-middleware" });
