import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { ConfigurationError } from "@tollgate/shared";
import type { RateLimitDecision } from "@tollgate/shared";
import type { RuleRegistry } from "../rules/registry.js";
import type { RateLimiter } from "../services/rate-limiter.js";

export interface AdmissionRouteConfig {
  operationId?: string;
  // Route param holding the resource id for user_resource rules.
  resourceParam?: string;
  cost?: number;
}

export interface AdmissionOptions {
  rateLimiter: RateLimiter;
  rules: RuleRegistry;
  identify?: (request: FastifyRequest) => string | undefined;
  hook?: "onRequest" | "preHandler";
}

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance: string;
  retryAfter: number;
}

const jwtClaimsSchema = z.object({
  sub: z.union([z.string().min(1), z.number()])
});

// Signature is not verified: the subject only picks a bucket.
export function bearerSubject(authorization: string | undefined): string | undefined {
  if (!authorization?.startsWith("Bearer ")) {
    return undefined;
  }

  const parts = authorization.slice("Bearer ".length).split(".");
  if (parts.length !== 3) {
    return undefined;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(parts[1], "base64url").toString("utf8"));
  } catch {
    return undefined;
  }

  const claims = jwtClaimsSchema.safeParse(payload);
  return claims.success ? String(claims.data.sub) : undefined;
}

export function operationIdFor(method: string, url: string, config?: AdmissionRouteConfig): string {
  if (config?.operationId) {
    return config.operationId;
  }
  // HEAD routes Fastify derives from GET routes share the GET bucket.
  const verb = method.toUpperCase() === "HEAD" ? "GET" : method.toUpperCase();
  return `${verb} ${url}`;
}

export function retryAfterHeader(retryAfterSeconds: number): number {
  return Math.max(1, Math.ceil(retryAfterSeconds));
}

function setQuotaHeaders(reply: FastifyReply, decision: RateLimitDecision): void {
  reply.header("X-RateLimit-Limit", decision.limit);
  reply.header("X-RateLimit-Remaining", decision.remaining);
  reply.header("X-RateLimit-Reset", decision.resetSeconds);
}

export function rateLimitedProblem(instance: string, retryAfter: number): ProblemDetails {
  return {
    type: "about:blank",
    title: "Too Many Requests",
    status: 429,
    detail: `Too many requests. Please try again in ${retryAfter} seconds.`,
    instance,
    retryAfter
  };
}

export function registerAdmission(fastify: FastifyInstance, options: AdmissionOptions): void {
  const identify = options.identify ?? ((request: FastifyRequest) => bearerSubject(request.headers.authorization));

  fastify.addHook("onRoute", (route) => {
    const config = route.config?.rateLimit;
    if (!config) {
      return;
    }
    const methods = Array.isArray(route.method) ? route.method : [route.method];
    for (const method of methods) {
      const operationId = operationIdFor(method, route.url, config);
      if (config.cost !== undefined && !(Number.isInteger(config.cost) && config.cost > 0)) {
        throw new ConfigurationError(`Invalid rate limit cost for ${operationId}`, [`cost: ${config.cost}`]);
      }
      options.rules.registerOperation(operationId);
    }
  });

  fastify.addHook("onReady", async () => {
    options.rules.assertComplete();
  });

  const admit = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    const config = request.routeOptions.config.rateLimit;
    if (!config) {
      return undefined;
    }

    const operationId = operationIdFor(request.method, request.routeOptions.url ?? request.url, config);

    let decision: RateLimitDecision;
    try {
      const params = z.record(z.string(), z.string()).safeParse(request.params);
      decision = await options.rateLimiter.check(
        operationId,
        {
          ip: request.ip,
          principalId: identify(request),
          resourceId: config.resourceParam && params.success ? params.data[config.resourceParam] : undefined,
          metadata: {
            correlationId: request.correlationId,
            method: request.method,
            path: request.url
          }
        },
        config.cost
      );
    } catch (error) {
      request.log.error({ err: error, operation: operationId, layer: "admission" }, "Admission check failed, allowing request");
      return undefined;
    }

    if (decision.source === "no_rule") {
      return undefined;
    }

    setQuotaHeaders(reply, decision);

    if (decision.allowed) {
      return undefined;
    }

    const retryAfter = retryAfterHeader(decision.retryAfterSeconds);
    request.log.info(
      { operation: operationId, correlationId: request.correlationId, retryAfter, layer: "admission" },
      "Request rate limited"
    );

    reply
      .code(429)
      .header("Retry-After", retryAfter)
      .type("application/problem+json")
      .send(rateLimitedProblem(request.url, retryAfter));
    return reply;
  };

  if (options.hook === "preHandler") {
    fastify.addHook("preHandler", admit);
  } else {
    fastify.addHook("onRequest", admit);
  }
}
