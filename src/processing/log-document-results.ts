import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { ProcessingResult } from '../domain/entities/processing-result.entity';

/**
 * One line per document, bound to its bucket and key.
 */
export function logDocumentResults(
  logger: PinoLoggerService,
  results: ReadonlyArray<ProcessingResult>,
): void {
  for (const result of results) {
    const documentLogger = logger.withDocumentKey(result.bucket, result.originalKey);

    if (ProcessingResult.isCompleted(result)) {
      documentLogger.info(
        { status: result.status, textKey: result.textKey, attempts: result.attempts },
        'Document processed',
      );
    } else {
      documentLogger.warn(
        {
          status: result.status,
          errorCode: result.errorCode,
          errorMessage: result.errorMessage,
          attempts: result.attempts,
        },
        'Document failed',
      );
    }
  }
}
