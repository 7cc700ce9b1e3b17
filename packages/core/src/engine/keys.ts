import type { CallerIdentity } from "@rankguard/schemas";

// Parts are URI-encoded; ':' only ever appears as the separator.
function join(parts: Array<string | number>): string {
  return parts.map((p) => encodeURIComponent(String(p))).join(":");
}

export function rankStateKey(endpointKey: string, identity: CallerIdentity): string {
  return `rank:${join([endpointKey, identity.group, identity.uniqueId])}`;
}

export function counterKey(
  endpointKey: string,
  identity: CallerIdentity,
  rankIndex: number,
  ruleIndex: number,
): string {
  return `counter:${join([endpointKey, identity.group, identity.uniqueId, rankIndex, ruleIndex])}`;
}

export function callerIgnoreKey(endpointKey: string, identity: CallerIdentity): string {
  return `ignore:${join([endpointKey, identity.group, identity.uniqueId])}`;
}

export function endpointIgnoreKey(endpointKey: string): string {
  return `ignore:${join([endpointKey])}`;
}
