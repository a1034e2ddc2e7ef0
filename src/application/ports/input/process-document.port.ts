import type { ProcessingResult } from '../../../domain/entities/processing-result.entity';

export const PROCESS_DOCUMENT_PORT = 'ProcessDocumentPort';

/**
 * Process Document Command
 */
export interface ProcessDocumentCommand {
  bucket: string;
  key: string;
}

/**
 * Process Document Port (Driving Port / Use Case Interface)
 * Extracts a document with retries and stores its text and metadata, or an
 * error document. Never rejects: failures come back as a failed result.
 */
export interface ProcessDocumentPort {
  execute(command: ProcessDocumentCommand): Promise<ProcessingResult>;
}
