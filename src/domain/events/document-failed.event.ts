import { DomainEvent } from './base.event';
import { FailureStatus } from '../value-objects/processing-status.vo';

/**
 * Document Failed Event
 * Emitted when a document reaches a terminal failure
 */
export interface DocumentFailedEventPayload {
  bucket: string;
  key: string;
  status: FailureStatus;
  errorCode: string;
  errorMessage: string;
  errorKey?: string;
  attempts: number;
}

export class DocumentFailedEvent extends DomainEvent {
  constructor(public readonly payload: DocumentFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'document.failed';
  }

  get key(): string {
    return this.payload.key;
  }

  get errorCode(): string {
    return this.payload.errorCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
