import type { FastifyBaseLogger } from "fastify";
import type { RateLimitEvent } from "@tollgate/shared";

export interface EventPublisher {
  publish(event: RateLimitEvent): Promise<void>;
}

export class NoopEventPublisher implements EventPublisher {
  async publish(): Promise<void> {
    return;
  }
}

export class LoggingEventPublisher implements EventPublisher {
  constructor(private readonly logger: FastifyBaseLogger) {}

  async publish(event: RateLimitEvent): Promise<void> {
    this.logger.debug(
      {
        eventId: event.id,
        eventType: event.type,
        operation: event.operationId,
        key: event.key,
        allowed: event.decision.allowed,
        source: event.decision.source,
        reason: event.reason,
        latencyMs: event.latencyMs
      },
      "Rate limit event"
    );
  }
}

export class CompositeEventPublisher implements EventPublisher {
  private readonly publishers: readonly EventPublisher[];

  constructor(publishers: EventPublisher[]) {
    this.publishers = [...publishers];
  }

  async publish(event: RateLimitEvent): Promise<void> {
    const results = await Promise.allSettled(this.publishers.map((publisher) => publisher.publish(event)));
    const failures = results.filter((result): result is PromiseRejectedResult => result.status === "rejected");
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => failure.reason),
        `${failures.length} of ${this.publishers.length} publishers failed for ${event.type}`
      );
    }
  }
}
