import { z } from "zod";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ConfigurationError, ScopeResolutionError, StoreError } from "@tollgate/shared";
import { withSpan } from "../telemetry/tracing.js";
import type { RuleRegistry } from "../rules/registry.js";
import type { RuleSet } from "../rules/rule-set.js";
import type { RateLimiter } from "../services/rate-limiter.js";

interface AdminDeps {
  token: string;
  rules: RuleRegistry;
  rateLimiter: RateLimiter;
  reloadRules: () => Promise<RuleSet>;
}

export const ADMIN_RELOAD_OPERATION = "admin.rules.reload";
export const ADMIN_RESET_OPERATION = "admin.buckets.reset";

const bucketSchema = z.object({
  operationId: z.string().min(1),
  ip: z.string().min(1).optional(),
  forwardedFor: z.string().min(1).optional(),
  principalId: z.string().min(1).optional(),
  resourceId: z.string().min(1).optional()
});

function requireAdminToken(request: FastifyRequest, token: string): boolean {
  const provided = request.headers["x-admin-token"];
  if (!provided || typeof provided !== "string") {
    return false;
  }
  return provided === token;
}

function sendBucketError(request: FastifyRequest, reply: FastifyReply, error: unknown) {
  if (error instanceof ScopeResolutionError) {
    reply.status(400);
    return { error: "scope_unresolved", details: [error.message] };
  }
  if (error instanceof StoreError) {
    request.log.error({ err: error, url: request.url }, "Bucket store request failed");
    reply.status(503);
    return { error: "store_unavailable" };
  }
  throw error;
}

export async function registerAdminRoutes(fastify: FastifyInstance, deps: AdminDeps): Promise<void> {
  await fastify.register(async (admin) => {
    admin.addHook("preHandler", async (request, reply) => {
      if (!requireAdminToken(request, deps.token)) {
        return reply.status(401).send({ error: "unauthorized" });
      }
      return undefined;
    });

    admin.get("/v1/admin/rules", async () => {
      return {
        registeredOperations: deps.rules.registeredOperations(),
        rules: deps.rules.rules.list().map((rule) => ({ ...rule.toJSON(), satisfiable: rule.satisfiable }))
      };
    });

    admin.post(
      "/v1/admin/rules/reload",
      { config: { rateLimit: { operationId: ADMIN_RELOAD_OPERATION } } },
      async (request, reply) => {
        try {
          const next = await withSpan("admin.reload_rules", {}, async () => deps.reloadRules());
          return { reloaded: true, rules: next.size };
        } catch (error) {
          if (error instanceof ConfigurationError) {
            request.log.warn({ err: error }, "Rule reload rejected, keeping active rules");
            reply.status(400);
            return { error: "invalid_rules", details: error.issues.length > 0 ? error.issues : [error.message] };
          }
          throw error;
        }
      }
    );

    admin.post("/v1/admin/buckets/peek", async (request, reply) => {
      const parsed = bucketSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const { operationId, ...identity } = parsed.data;
      try {
        const state = await deps.rateLimiter.inspect(operationId, identity);
        if (state === undefined) {
          reply.status(404);
          return { error: `No rule for operation: ${operationId}` };
        }
        const remaining = await deps.rateLimiter.remaining(operationId, identity);
        return { operationId, remaining, state };
      } catch (error) {
        return sendBucketError(request, reply, error);
      }
    });

    admin.post(
      "/v1/admin/buckets/reset",
      { config: { rateLimit: { operationId: ADMIN_RESET_OPERATION } } },
      async (request, reply) => {
        const parsed = bucketSchema.safeParse(request.body);
        if (!parsed.success) {
          reply.status(400);
          return { error: "validation_error", details: parsed.error.flatten() };
        }

        const { operationId, ...identity } = parsed.data;
        try {
          const reset = await withSpan("admin.reset_bucket", { "ratelimit.operation": operationId }, async () =>
            deps.rateLimiter.reset(operationId, identity)
          );
          if (!reset) {
            reply.status(404);
            return { error: `No rule for operation: ${operationId}` };
          }
          return { operationId, reset: true };
        } catch (error) {
          return sendBucketError(request, reply, error);
        }
      }
    );
  });
}
