import type { DomainEvent } from '../../../domain/events/base.event';

export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';

/**
 * Event Publisher Port (Driven Port)
 * Interface for publishing domain events
 */
export interface EventPublisherPort {
  /**
   * Publish a single domain event
   */
  publish(event: DomainEvent): Promise<void>;

  /**
   * Publish multiple domain events
   */
  publishBatch(events: DomainEvent[]): Promise<void>;
}
