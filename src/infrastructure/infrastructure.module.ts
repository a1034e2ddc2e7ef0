import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';

// Shared services
import { S3Module } from '../shared/aws/s3/s3.module';
import { TextractModule } from '../shared/aws/textract/textract.module';
import { LoggingModule } from '../shared/logging/logging.module';

// Injection tokens
import {
  EVENT_PUBLISHER_PORT,
  OBJECT_STORAGE_PORT,
  OCR_GATEWAY_PORT,
} from '../application/ports/output';

// Adapters (implementations)
import { S3ObjectStorageAdapter } from './adapters/storage/s3-object-storage.adapter';
import { TextractOcrGatewayAdapter } from './adapters/ocr/textract-ocr-gateway.adapter';
import { ConsoleEventPublisherAdapter } from './adapters/events/console-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 */
@Module({
  imports: [ConfigModule, LoggingModule, S3Module, TextractModule],
  providers: [
    {
      provide: OBJECT_STORAGE_PORT,
      useClass: S3ObjectStorageAdapter,
    },
    {
      provide: OCR_GATEWAY_PORT,
      useClass: TextractOcrGatewayAdapter,
    },
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: ConsoleEventPublisherAdapter,
    },
  ],
  exports: [OBJECT_STORAGE_PORT, OCR_GATEWAY_PORT, EVENT_PUBLISHER_PORT],
})
export class InfrastructureModule {}
