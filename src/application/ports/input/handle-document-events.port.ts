import type { ProcessingResult } from '../../../domain/entities/processing-result.entity';
import type { SkipReason } from '../../../domain/value-objects/document-key-layout.vo';

export const HANDLE_DOCUMENT_EVENTS_PORT = 'HandleDocumentEventsPort';

/**
 * One "object created" notification, key already URL-decoded
 */
export interface DocumentEventRecord {
  bucket: string;
  key: string;
  eventName?: string;
  size?: number;
}

/**
 * Handle Document Events Command
 */
export interface HandleDocumentEventsCommand {
  records: DocumentEventRecord[];
  correlationId?: string;
}

export type RecordSkipReason = SkipReason | 'unexpected_bucket';

export interface SkippedRecord {
  bucket: string;
  key: string;
  reason: RecordSkipReason;
}

/**
 * Handle Document Events Result
 */
export interface HandleDocumentEventsResult {
  total: number;
  succeeded: number;
  failed: number;
  skipped: SkippedRecord[];
  results: ProcessingResult[];
  durationMs: number;
}

/**
 * Handle Document Events Port (Driving Port / Use Case Interface)
 * Filters a batch of notifications and processes each qualifying document
 */
export interface HandleDocumentEventsPort {
  execute(command: HandleDocumentEventsCommand): Promise<HandleDocumentEventsResult>;
}
