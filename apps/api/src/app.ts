import { randomUUID } from "node:crypto";
import fastify from "fastify";
import type { FastifyBaseLogger } from "fastify";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import type { AppConfig } from "@tollgate/shared";
import { loggerOptions } from "@tollgate/shared";
import { registerAdmission } from "./plugins/admission.js";
import { createRedisClient } from "./redis/client.js";
import { RedisScriptManager } from "./redis/scripts.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerOpsRoutes } from "./routes/ops.js";
import { registerRateLimitRoutes } from "./routes/ratelimit.js";
import { RuleRegistry } from "./rules/registry.js";
import { loadRuleSetFromFile } from "./rules/rule-set.js";
import type { RuleSet } from "./rules/rule-set.js";
import { AuditEventPublisher, LoggerAuditSink, PostgresAuditSink } from "./services/audit.js";
import type { AuditSink } from "./services/audit.js";
import { CompositeEventPublisher, LoggingEventPublisher } from "./services/events.js";
import type { EventPublisher } from "./services/events.js";
import { MetricsService } from "./services/metrics.js";
import { RateLimiter } from "./services/rate-limiter.js";
import { InMemoryBucketStore } from "./store/memory-store.js";
import { RedisBucketStore } from "./store/redis-store.js";
import type { BucketStore } from "./store/types.js";

export interface BuildAppOverrides {
  store?: BucketStore;
  auditSink?: AuditSink;
  publishers?: EventPublisher[];
  now?: () => number;
}

export async function buildApp(config: AppConfig, overrides: BuildAppOverrides = {}) {
  const app = fastify({
    logger: loggerOptions(config.LOG_LEVEL),
    trustProxy: config.TRUST_PROXY
  });

  await app.register(helmet);
  await app.register(cors, { origin: true });
  await app.register(sensible);

  app.decorateRequest("correlationId", "");
  app.addHook("onRequest", async (request, reply) => {
    const headerValue = request.headers["x-correlation-id"];
    const correlationId = typeof headerValue === "string" && headerValue.length > 0 ? headerValue : randomUUID();
    request.correlationId = correlationId;
    reply.header("x-correlation-id", correlationId);
  });

  const metrics = new MetricsService({ collectDefaults: config.NODE_ENV !== "test" });
  const rules = new RuleRegistry(await loadRuleSetFromFile(config.RULES_FILE));

  const reportRules = (ruleSet: RuleSet) => {
    metrics.rulesLoaded.set(ruleSet.size);
    for (const rule of ruleSet.list()) {
      if (!rule.satisfiable) {
        app.log.warn(
          { operation: rule.operationId, capacity: rule.capacity, cost: rule.cost },
          "Rule cost exceeds capacity, every request will be denied"
        );
      }
    }
  };
  reportRules(rules.rules);
  rules.onReload((next) => {
    reportRules(next);
    app.log.info({ rules: next.size }, "Rate limit rules reloaded");
  });

  const reloadRules = async (): Promise<RuleSet> => {
    const next = await loadRuleSetFromFile(config.RULES_FILE);
    rules.replace(next);
    return next;
  };

  const store = overrides.store ?? (await createStore(config, app.log));

  const auditSink =
    overrides.auditSink ??
    (config.AUDIT_DATABASE_URL
      ? PostgresAuditSink.fromUrl(config.AUDIT_DATABASE_URL, app.log)
      : new LoggerAuditSink(app.log));
  await auditSink.init();

  const events = new CompositeEventPublisher([
    new LoggingEventPublisher(app.log),
    new AuditEventPublisher(auditSink),
    ...(overrides.publishers ?? [])
  ]);

  const rateLimiter = new RateLimiter(rules, store, events, metrics, app.log, {
    storeTimeoutMs: config.STORE_TIMEOUT_MS,
    now: overrides.now
  });

  registerAdmission(app, { rateLimiter, rules });

  await registerOpsRoutes(app, { store, metrics });
  await registerRateLimitRoutes(app, rateLimiter);
  await registerAdminRoutes(app, {
    token: config.ADMIN_TOKEN,
    rules,
    rateLimiter,
    reloadRules
  });

  return {
    app,
    rules,
    rateLimiter,
    reloadRules,
    close: async () => {
      await app.close();
      await Promise.all([store.close(), auditSink.close()]);
    }
  };
}

async function createStore(config: AppConfig, logger: FastifyBaseLogger): Promise<BucketStore> {
  if (config.STORE_DRIVER === "memory") {
    logger.warn("Using the in-memory bucket store; quotas are not shared between instances");
    return new InMemoryBucketStore({ ttlMarginSeconds: config.BUCKET_TTL_MARGIN_SECONDS });
  }

  const redis = createRedisClient(config.REDIS_URL, { commandTimeoutMs: config.STORE_TIMEOUT_MS }, logger);
  const scripts = new RedisScriptManager(redis);

  try {
    await redis.connect();
    await scripts.loadScripts();
  } catch (error) {
    // Scripts load lazily on first use; until Redis answers, checks fail open.
    logger.error({ err: error }, "Redis unavailable at startup");
  }

  return new RedisBucketStore(redis, scripts, {
    keyPrefix: config.KEY_PREFIX,
    ttlMarginSeconds: config.BUCKET_TTL_MARGIN_SECONDS
  });
}
