export { DomainEvent } from './base.event';
export {
  DocumentProcessedEvent,
  type DocumentProcessedEventPayload,
} from './document-processed.event';
export { DocumentFailedEvent, type DocumentFailedEventPayload } from './document-failed.event';
