import { Inject, Injectable } from '@nestjs/common';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { HANDLE_DOCUMENT_EVENTS_PORT } from '../../application/ports/input/handle-document-events.port';
import type { HandleDocumentEventsPort } from '../../application/ports/input/handle-document-events.port';
import { ProcessingResult } from '../../domain/entities/processing-result.entity';
import { logDocumentResults } from '../log-document-results';
import { S3EventNotificationSchema, toDocumentEventRecords } from '../dto/s3-event-notification.dto';
import { LambdaResponse, errorResponse, jsonResponse } from './lambda-response';

/**
 * Document Events Lambda Handler
 * Turns an S3 notification delivered to Lambda into a use case call and an
 * API-style response. Never throws.
 */
@Injectable()
export class DocumentEventsLambdaHandler {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(HANDLE_DOCUMENT_EVENTS_PORT)
    private readonly handleDocumentEvents: HandleDocumentEventsPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(DocumentEventsLambdaHandler.name);
  }

  async handle(event: unknown, requestId: string): Promise<LambdaResponse> {
    const requestLogger = this.logger.withCorrelationId(requestId);

    const parsed = S3EventNotificationSchema.safeParse(event);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`)
        .join('; ');
      requestLogger.warn({ issues: parsed.error.issues }, 'Event is not an S3 notification');
      return errorResponse(400, 'Invalid event', message);
    }

    const records = toDocumentEventRecords(parsed.data);

    try {
      const result = await this.handleDocumentEvents.execute({ records, correlationId: requestId });

      requestLogger.info(
        {
          total: result.total,
          succeeded: result.succeeded,
          failed: result.failed,
          skipped: result.skipped.length,
        },
        'S3 event processed',
      );
      logDocumentResults(requestLogger, result.results);

      return jsonResponse(200, {
        message: `Processed ${result.total} document(s)`,
        total: result.total,
        succeeded: result.succeeded,
        failed: result.failed,
        skipped: result.skipped,
        durationMs: result.durationMs,
        results: result.results.map(ProcessingResult.toSummary),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      requestLogger.error({ error: message }, 'Failed to process S3 event');
      return errorResponse(500, 'Internal error', message);
    }
  }
}
