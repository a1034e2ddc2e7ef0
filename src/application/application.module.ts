import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Input port tokens
import {
  EXTRACT_TEXT_PORT,
  HANDLE_DOCUMENT_EVENTS_PORT,
  LIST_PROCESSED_DOCUMENTS_PORT,
  PROCESS_DOCUMENT_PORT,
} from './ports/input';

// Use Cases
import {
  ExtractTextUseCase,
  ProcessDocumentUseCase,
  HandleDocumentEventsUseCase,
  ListProcessedDocumentsUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * This module depends on output ports (interfaces) but not on their implementations.
 * The implementations (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [ConfigModule, InfrastructureModule],
  providers: [
    ExtractTextUseCase,
    ProcessDocumentUseCase,
    HandleDocumentEventsUseCase,
    ListProcessedDocumentsUseCase,
    { provide: EXTRACT_TEXT_PORT, useExisting: ExtractTextUseCase },
    { provide: PROCESS_DOCUMENT_PORT, useExisting: ProcessDocumentUseCase },
    { provide: HANDLE_DOCUMENT_EVENTS_PORT, useExisting: HandleDocumentEventsUseCase },
    { provide: LIST_PROCESSED_DOCUMENTS_PORT, useExisting: ListProcessedDocumentsUseCase },
  ],
  exports: [
    // Driving adapters (consumer, Lambda handler) depend on the port tokens
    EXTRACT_TEXT_PORT,
    PROCESS_DOCUMENT_PORT,
    HANDLE_DOCUMENT_EVENTS_PORT,
    LIST_PROCESSED_DOCUMENTS_PORT,
  ],
})
export class ApplicationModule {}
