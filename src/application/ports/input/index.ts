/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export { EXTRACT_TEXT_PORT, type ExtractTextPort, type ExtractTextCommand } from './extract-text.port';
export {
  PROCESS_DOCUMENT_PORT,
  type ProcessDocumentPort,
  type ProcessDocumentCommand,
} from './process-document.port';
export {
  HANDLE_DOCUMENT_EVENTS_PORT,
  type HandleDocumentEventsPort,
  type HandleDocumentEventsCommand,
  type HandleDocumentEventsResult,
  type DocumentEventRecord,
  type RecordSkipReason,
  type SkippedRecord,
} from './handle-document-events.port';
export {
  LIST_PROCESSED_DOCUMENTS_PORT,
  type ListProcessedDocumentsPort,
  type ProcessedDocument,
} from './list-processed-documents.port';
