import { DomainEvent } from './base.event';
import { ExtractionMethod } from '../value-objects/extraction-method.vo';

/**
 * Document Processed Event
 * Emitted once the text and metadata outputs of a document are stored
 */
export interface DocumentProcessedEventPayload {
  bucket: string;
  key: string;
  textKey: string;
  metadataKey: string;
  method: ExtractionMethod;
  pageCount: number;
  characterCount: number;
  averageConfidence: number;
  isHighQuality: boolean;
  attempts: number;
}

export class DocumentProcessedEvent extends DomainEvent {
  constructor(public readonly payload: DocumentProcessedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'document.processed';
  }

  get key(): string {
    return this.payload.key;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
