import { isIP } from "node:net";
import { ScopeResolutionError } from "@tollgate/shared";
import type { RequestIdentity } from "@tollgate/shared";
import type { RateLimitRule } from "../rules/rule.js";

export const UNKNOWN_IP = "unknown";
const GLOBAL_IDENTIFIER = "global";
const MISSING_RESOURCE = "-";

export function normalizeIp(raw: string | undefined): string {
  if (!raw) {
    return UNKNOWN_IP;
  }

  let candidate = raw.trim();

  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(candidate);
  if (bracketed) {
    candidate = bracketed[1];
  } else if (/^\d{1,3}(\.\d{1,3}){3}:\d+$/.test(candidate)) {
    candidate = candidate.slice(0, candidate.lastIndexOf(":"));
  }

  const zoneIndex = candidate.indexOf("%");
  if (zoneIndex !== -1) {
    candidate = candidate.slice(0, zoneIndex);
  }

  candidate = candidate.toLowerCase();

  const mapped = /^::ffff:(\d{1,3}(\.\d{1,3}){3})$/.exec(candidate);
  if (mapped && isIP(mapped[1]) === 4) {
    return mapped[1];
  }

  return isIP(candidate) === 0 ? UNKNOWN_IP : candidate;
}

export function clientIp(identity: RequestIdentity): string {
  const firstHop = identity.forwardedFor?.split(",")[0]?.trim();
  return normalizeIp(firstHop && firstHop.length > 0 ? firstHop : identity.ip);
}

// Escapes the separator and the escape character only; never throws.
function component(value: string): string {
  return value.replace(/[%:]/g, (char) => (char === "%" ? "%25" : "%3A"));
}

export function buildScopeKey(rule: RateLimitRule, identity: RequestIdentity): string {
  switch (rule.scope) {
    case "ip":
      return `ip:${clientIp(identity)}:${rule.operationId}`;
    case "user": {
      const principalId = requirePrincipal(rule, identity);
      return `user:${component(principalId)}:${rule.operationId}`;
    }
    case "user_resource": {
      const principalId = requirePrincipal(rule, identity);
      const resourceId = identity.resourceId ? component(identity.resourceId) : MISSING_RESOURCE;
      return `user_resource:${component(principalId)}:${resourceId}:${rule.operationId}`;
    }
    case "global":
      return `${GLOBAL_IDENTIFIER}:${rule.operationId}`;
  }
}

function requirePrincipal(rule: RateLimitRule, identity: RequestIdentity): string {
  if (!identity.principalId) {
    throw new ScopeResolutionError(rule.operationId, rule.scope, "principalId");
  }
  return identity.principalId;
}
