import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DocumentEventsLambdaHandler } from '../../../src/processing/handlers/document-events.lambda-handler';
import type {
  HandleDocumentEventsCommand,
  HandleDocumentEventsPort,
  HandleDocumentEventsResult,
} from '../../../src/application/ports/input/handle-document-events.port';
import { ProcessingResult } from '../../../src/domain/entities/processing-result.entity';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import { createTestLogger } from '../helpers/test-factories';

const PROCESSED_AT = new Date('2024-03-01T12:00:00.000Z');

/**
 * Fails every record it receives, or throws when told to
 */
class StubEventsHandler implements HandleDocumentEventsPort {
  readonly commands: HandleDocumentEventsCommand[] = [];
  error?: Error;

  async execute(command: HandleDocumentEventsCommand): Promise<HandleDocumentEventsResult> {
    this.commands.push(command);
    if (this.error) {
      throw this.error;
    }

    const results = command.records.map((record) =>
      ProcessingResult.failed({
        bucket: record.bucket,
        originalKey: record.key,
        errorCode: 'VALIDATION_FAILED',
        errorMessage: 'Document is empty',
        errorKey: 'errors/empty_error.json',
        attempts: 1,
        processedAt: PROCESSED_AT,
      }),
    );

    return {
      total: results.length,
      succeeded: 0,
      failed: results.length,
      skipped: [],
      results,
      durationMs: 5,
    };
  }
}

describe('DocumentEventsLambdaHandler', () => {
  let events: StubEventsHandler;
  let logger: PinoLoggerService;
  let handler: DocumentEventsLambdaHandler;

  beforeEach(() => {
    events = new StubEventsHandler();
    logger = createTestLogger();
    handler = new DocumentEventsLambdaHandler(events, logger);
  });

  it('should answer 200 with the processing summary', async () => {
    const response = await handler.handle(
      {
        Records: [
          { s3: { bucket: { name: 'test-bucket' }, object: { key: 'input/empty%20file.pdf' } } },
        ],
      },
      'req-1',
    );

    expect(events.commands[0]).toEqual({
      records: [
        { bucket: 'test-bucket', key: 'input/empty file.pdf', eventName: undefined, size: undefined },
      ],
      correlationId: 'req-1',
    });
    expect(response.statusCode).toBe(200);
    expect(response.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(JSON.parse(response.body)).toEqual({
      message: 'Processed 1 document(s)',
      total: 1,
      succeeded: 0,
      failed: 1,
      skipped: [],
      durationMs: 5,
      results: [
        {
          status: 'failed',
          bucket: 'test-bucket',
          originalFile: 'input/empty file.pdf',
          attempts: 1,
          processedAt: '2024-03-01T12:00:00.000Z',
          errorCode: 'VALIDATION_FAILED',
          errorMessage: 'Document is empty',
          errorFileKey: 'errors/empty_error.json',
        },
      ],
    });
  });

  it('should log each document result bound to its key', async () => {
    const withDocumentKey = vi.spyOn(logger, 'withDocumentKey');

    await handler.handle(
      {
        Records: [
          { s3: { bucket: { name: 'test-bucket' }, object: { key: 'input/a.pdf' } } },
          { s3: { bucket: { name: 'test-bucket' }, object: { key: 'input/b.pdf' } } },
        ],
      },
      'req-4',
    );

    expect(withDocumentKey.mock.calls).toEqual([
      ['test-bucket', 'input/a.pdf'],
      ['test-bucket', 'input/b.pdf'],
    ]);
  });

  it('should answer 400 for an event without records', async () => {
    const response = await handler.handle({}, 'req-2');

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      error: 'Invalid event',
      message: 'Records: Required',
    });
    expect(events.commands).toHaveLength(0);
  });

  it('should answer 500 when processing throws', async () => {
    events.error = new Error('boom');

    const response = await handler.handle({ Records: [] }, 'req-3');

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({ error: 'Internal error', message: 'boom' });
  });
});
