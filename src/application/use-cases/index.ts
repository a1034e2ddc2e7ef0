/**
 * Use Cases Barrel Export
 */
export { ExtractTextUseCase } from './extract-text.use-case';
export { ProcessDocumentUseCase } from './process-document.use-case';
export { HandleDocumentEventsUseCase } from './handle-document-events.use-case';
export { ListProcessedDocumentsUseCase } from './list-processed-documents.use-case';
