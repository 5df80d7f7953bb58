import type { FastifyInstance } from "fastify";
import type { MetricsService } from "../services/metrics.js";
import type { BucketStore } from "../store/types.js";

interface OpsDeps {
  store: BucketStore;
  metrics: MetricsService;
}

export async function registerOpsRoutes(fastify: FastifyInstance, deps: OpsDeps): Promise<void> {
  fastify.get("/health", async () => ({ status: "ok", service: "tollgate" }));

  fastify.get("/ready", async (_request, reply) => {
    const storeOk = await deps.store.healthcheck();

    // Checks still fail open without a store, so this only reports degradation.
    if (!storeOk) {
      reply.status(503);
    }

    return {
      status: storeOk ? "ready" : "degraded",
      checks: {
        store: storeOk,
        driver: deps.store.kind
      }
    };
  });

  fastify.get("/metrics", async (_request, reply) => {
    reply.header("content-type", deps.metrics.registry.contentType);
    return deps.metrics.getMetricsText();
  });
}
