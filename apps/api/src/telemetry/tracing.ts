import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { RateLimitDecision } from "@tollgate/shared";

const tracer = trace.getTracer("tollgate-api");

export async function withSpan<T>(name: string, attributes: Record<string, string | number | boolean>, fn: () => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      span.setAttributes(attributes);
      return await fn();
    } catch (error) {
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function annotateDecision(decision: RateLimitDecision): void {
  const span = trace.getActiveSpan();
  if (!span) {
    return;
  }

  span.setAttributes({
    "ratelimit.operation": decision.operationId,
    "ratelimit.source": decision.source,
    "ratelimit.allowed": decision.allowed,
    "ratelimit.limit": decision.limit,
    "ratelimit.remaining": decision.remaining,
    "ratelimit.reset_seconds": decision.resetSeconds,
    "ratelimit.retry_after_seconds": decision.retryAfterSeconds
  });
}
