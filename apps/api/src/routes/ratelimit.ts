import { z } from "zod";
import type { FastifyInstance, FastifyReply } from "fastify";
import type { RateLimitDecision } from "@tollgate/shared";
import { retryAfterHeader } from "../plugins/admission.js";
import { annotateDecision, withSpan } from "../telemetry/tracing.js";
import type { RateLimiter } from "../services/rate-limiter.js";

export const checkSchema = z.object({
  operationId: z.string().min(1),
  ip: z.string().min(1).optional(),
  forwardedFor: z.string().min(1).optional(),
  principalId: z.string().min(1).optional(),
  resourceId: z.string().min(1).optional(),
  cost: z.coerce.number().int().positive().optional()
});

function setRateLimitHeaders(reply: FastifyReply, decision: RateLimitDecision): void {
  if (decision.source === "no_rule") {
    return;
  }

  reply.header("X-RateLimit-Limit", decision.limit);
  reply.header("X-RateLimit-Remaining", decision.remaining);
  reply.header("X-RateLimit-Reset", decision.resetSeconds);

  if (!decision.allowed) {
    reply.header("Retry-After", retryAfterHeader(decision.retryAfterSeconds));
  }
}

export async function registerRateLimitRoutes(fastify: FastifyInstance, rateLimiter: RateLimiter): Promise<void> {
  fastify.post("/v1/ratelimit/check", async (request, reply) => {
    const parsed = checkSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return {
        error: "validation_error",
        details: parsed.error.flatten()
      };
    }

    const { operationId, cost, ...identity } = parsed.data;

    const decision = await withSpan(
      "ratelimit.check",
      cost === undefined ? { "ratelimit.operation": operationId } : { "ratelimit.operation": operationId, "ratelimit.cost": cost },
      async () =>
        rateLimiter.check(
          operationId,
          {
            ...identity,
            metadata: { correlationId: request.correlationId, method: request.method, path: request.url }
          },
          cost
        )
    );

    annotateDecision(decision);
    setRateLimitHeaders(reply, decision);

    if (!decision.allowed) {
      reply.status(429);
    }

    return decision;
  });
}
