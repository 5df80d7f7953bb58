import type { FastifyBaseLogger } from "fastify";
import { Pool } from "pg";
import type { AuditEntry, RateLimitEvent } from "@tollgate/shared";
import type { EventPublisher } from "./events.js";

export interface AuditSink {
  init(): Promise<void>;
  record(entry: AuditEntry): Promise<void>;
  close(): Promise<void>;
}

export function toAuditEntry(event: RateLimitEvent): AuditEntry | null {
  if (event.type !== "ratelimit.denied" && event.type !== "ratelimit.fail_open") {
    return null;
  }

  return {
    eventId: event.id,
    outcome: event.type === "ratelimit.denied" ? "denied" : "fail_open",
    occurredAt: event.occurredAt,
    operationId: event.operationId,
    scope: event.scope,
    key: event.key,
    limit: event.decision.limit,
    retryAfterSeconds: event.decision.retryAfterSeconds,
    reason: event.reason,
    request: event.request
  };
}

export class AuditEventPublisher implements EventPublisher {
  constructor(private readonly sink: AuditSink) {}

  async publish(event: RateLimitEvent): Promise<void> {
    const entry = toAuditEntry(event);
    if (entry) {
      await this.sink.record(entry);
    }
  }
}

export class LoggerAuditSink implements AuditSink {
  constructor(private readonly logger: FastifyBaseLogger) {}

  async init(): Promise<void> {
    return;
  }

  async record(entry: AuditEntry): Promise<void> {
    this.logger.warn({ audit: entry }, entry.outcome === "denied" ? "Rate limit denial" : "Rate limit fail-open");
  }

  async close(): Promise<void> {
    return;
  }
}

export interface AuditPool {
  query(text: string, values?: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

export class PostgresAuditSink implements AuditSink {
  constructor(
    private readonly pool: AuditPool,
    private readonly logger: FastifyBaseLogger
  ) {}

  static fromUrl(databaseUrl: string, logger: FastifyBaseLogger): PostgresAuditSink {
    return new PostgresAuditSink(
      new Pool({
        connectionString: databaseUrl,
        max: 5,
        connectionTimeoutMillis: 2_000,
        query_timeout: 2_000
      }),
      logger
    );
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS rate_limit_audit_logs (
        id UUID PRIMARY KEY,
        outcome TEXT NOT NULL,
        operation_id TEXT NOT NULL,
        scope TEXT NOT NULL,
        bucket_key TEXT,
        limit_value INTEGER NOT NULL,
        retry_after_seconds DOUBLE PRECISION NOT NULL,
        reason TEXT,
        correlation_id TEXT,
        http_method TEXT,
        http_path TEXT,
        occurred_at TIMESTAMPTZ NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_rate_limit_audit_operation_time
      ON rate_limit_audit_logs(operation_id, occurred_at);
    `);
  }

  async record(entry: AuditEntry): Promise<void> {
    try {
      await this.pool.query(
        `
        INSERT INTO rate_limit_audit_logs (
          id,
          outcome,
          operation_id,
          scope,
          bucket_key,
          limit_value,
          retry_after_seconds,
          reason,
          correlation_id,
          http_method,
          http_path,
          occurred_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
        ON CONFLICT (id) DO NOTHING;
      `,
        [
          entry.eventId,
          entry.outcome,
          entry.operationId,
          entry.scope,
          entry.key ?? null,
          entry.limit,
          entry.retryAfterSeconds,
          entry.reason ?? null,
          entry.request?.correlationId ?? null,
          entry.request?.method ?? null,
          entry.request?.path ?? null,
          entry.occurredAt
        ]
      );
    } catch (error) {
      this.logger.error({ err: error, eventId: entry.eventId }, "Audit write failed");
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
