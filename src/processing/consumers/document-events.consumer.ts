import { Inject, Injectable } from '@nestjs/common';
import { SqsMessageHandler } from '@ssut/nestjs-sqs';
import { Message } from '@aws-sdk/client-sqs';
import { ZodError } from 'zod';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { HANDLE_DOCUMENT_EVENTS_PORT } from '../../application/ports/input/handle-document-events.port';
import type { HandleDocumentEventsPort } from '../../application/ports/input/handle-document-events.port';
import {
  S3EventNotificationDto,
  isS3TestEvent,
  toDocumentEventRecords,
  validateS3EventNotification,
} from '../dto/s3-event-notification.dto';
import { logDocumentResults } from '../log-document-results';

export const DOCUMENT_EVENTS_QUEUE = 'document-events-queue';

/**
 * Document Events Consumer
 * Listens to document-events-queue, which receives the bucket's S3
 * "object created" notifications
 * Uses @ssut/nestjs-sqs for message consumption
 */
@Injectable()
export class DocumentEventsConsumer {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(HANDLE_DOCUMENT_EVENTS_PORT)
    private readonly handleDocumentEvents: HandleDocumentEventsPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(DocumentEventsConsumer.name);
  }

  @SqsMessageHandler(DOCUMENT_EVENTS_QUEUE, false)
  async handleMessage(message: Message): Promise<void> {
    const messageId = message.MessageId ?? 'unknown';
    const messageLogger = this.logger.withCorrelationId(messageId);

    let body: unknown;
    try {
      body = JSON.parse(message.Body ?? '{}');
    } catch (error) {
      messageLogger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to parse message body',
      );
      // Return without throwing to delete invalid message
      return;
    }

    if (isS3TestEvent(body)) {
      messageLogger.info('Ignoring S3 test event');
      return;
    }

    let notification: S3EventNotificationDto;
    try {
      notification = validateS3EventNotification(body);
    } catch (error) {
      if (!(error instanceof ZodError)) {
        throw error;
      }
      messageLogger.error({ issues: error.issues }, 'Invalid S3 event notification');
      return;
    }

    const records = toDocumentEventRecords(notification);
    messageLogger.info({ records: records.length }, 'Processing S3 event notification');

    try {
      const result = await this.handleDocumentEvents.execute({
        records,
        correlationId: messageId,
      });

      messageLogger.info(
        {
          total: result.total,
          succeeded: result.succeeded,
          failed: result.failed,
          skipped: result.skipped.length,
          durationMs: result.durationMs,
        },
        'S3 event notification processed',
      );
      logDocumentResults(messageLogger, result.results);
    } catch (error) {
      messageLogger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Error processing S3 event notification',
      );

      // Re-throw to trigger SQS retry (message will not be deleted)
      throw error;
    }
  }
}
