import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProcessDocumentUseCase } from '../../../src/application/use-cases/process-document.use-case';
import type {
  ExtractTextCommand,
  ExtractTextPort,
} from '../../../src/application/ports/input/extract-text.port';
import { ExtractionResult } from '../../../src/domain/entities/extraction-result.entity';
import { ProcessingResult } from '../../../src/domain/entities/processing-result.entity';
import { ConfidenceStatsVO } from '../../../src/domain/value-objects/confidence-stats.vo';
import { ExtractionMethod } from '../../../src/domain/value-objects/extraction-method.vo';
import { ProcessingStatus } from '../../../src/domain/value-objects/processing-status.vo';
import {
  ValidationResult,
  validResult,
} from '../../../src/domain/value-objects/validation-result.vo';
import {
  DocumentValidationError,
  ExtractionTimeoutError,
  OcrServiceError,
} from '../../../src/domain/errors/extraction.errors';
import {
  InMemoryEventPublisherAdapter,
  InMemoryObjectStorageAdapter,
} from '../../in-memory-adapters';
import { TEST_BUCKET, createTestConfig } from '../helpers/test-factories';

/**
 * Returns the scripted outcomes in order; the last one repeats
 */
class ScriptedExtractText implements ExtractTextPort {
  readonly commands: ExtractTextCommand[] = [];

  constructor(private readonly outcomes: Array<ExtractionResult | Error>) {}

  async execute(command: ExtractTextCommand): Promise<ExtractionResult> {
    this.commands.push(command);
    const outcome = this.outcomes[Math.min(this.commands.length, this.outcomes.length) - 1];
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  async validateDocument(): Promise<ValidationResult> {
    return validResult({ fileSize: 1, format: 'pdf', warnings: [] });
  }
}

describe('ProcessDocumentUseCase', () => {
  const command = { bucket: TEST_BUCKET, key: 'input/report.pdf' };
  const extraction = ExtractionResult.create({
    text: 'Quarterly report\nRevenue up',
    confidence: ConfidenceStatsVO.fromScores([96, 98]),
    method: ExtractionMethod.SYNC,
    pageCount: 1,
    processingTimeMs: 25,
  });

  let storage: InMemoryObjectStorageAdapter;
  let publisher: InMemoryEventPublisherAdapter;

  const createUseCase = (
    extractText: ExtractTextPort,
    env: Record<string, string> = {},
  ): ProcessDocumentUseCase =>
    new ProcessDocumentUseCase(extractText, storage, publisher, createTestConfig(env));

  beforeEach(() => {
    storage = new InMemoryObjectStorageAdapter();
    publisher = new InMemoryEventPublisherAdapter();
  });

  describe('successful extraction', () => {
    it('should write the text and metadata outputs', async () => {
      const useCase = createUseCase(new ScriptedExtractText([extraction]));

      const result = await useCase.execute(command);

      expect(ProcessingResult.isCompleted(result)).toBe(true);
      expect(result).toMatchObject({
        status: ProcessingStatus.COMPLETED,
        originalKey: 'input/report.pdf',
        textKey: 'text/report.txt',
        metadataKey: 'metadata/report.json',
        attempts: 1,
      });
      expect(storage.getText(TEST_BUCKET, 'text/report.txt')).toBe('Quarterly report\nRevenue up');
      expect(storage.getStored(TEST_BUCKET, 'text/report.txt')?.contentType).toBe(
        'text/plain; charset=utf-8',
      );
      expect(storage.getStored(TEST_BUCKET, 'text/report.txt')?.metadata).toEqual({
        'source-key': 'input%2Freport.pdf',
      });
    });

    it('should describe the extraction in the metadata document', async () => {
      const useCase = createUseCase(new ScriptedExtractText([extraction]));

      await useCase.execute(command);

      expect(storage.getStored(TEST_BUCKET, 'metadata/report.json')?.contentType).toBe(
        'application/json',
      );
      expect(storage.getJson(TEST_BUCKET, 'metadata/report.json')).toMatchObject({
        originalFile: 'input/report.pdf',
        bucket: TEST_BUCKET,
        status: 'completed',
        textFile: 'text/report.txt',
        attempts: 1,
        extraction: {
          method: 'sync',
          pageCount: 1,
          characterCount: 27,
          wordCount: 4,
          isHighQuality: true,
          confidence: { averageConfidence: 97, totalBlocks: 2 },
        },
      });
    });

    it('should publish a document.processed event', async () => {
      const useCase = createUseCase(new ScriptedExtractText([extraction]));

      await useCase.execute(command);

      expect(publisher.getEventNames()).toEqual(['document.processed']);
      expect(publisher.getPublishedEvents()[0].toJSON()).toMatchObject({
        eventName: 'document.processed',
        payload: {
          bucket: TEST_BUCKET,
          key: 'input/report.pdf',
          textKey: 'text/report.txt',
          metadataKey: 'metadata/report.json',
          averageConfidence: 97,
          attempts: 1,
        },
      });
    });

    it('should keep the result when publishing fails', async () => {
      publisher.failWith(new Error('bus unavailable'));
      const useCase = createUseCase(new ScriptedExtractText([extraction]));

      const result = await useCase.execute(command);

      expect(result.status).toBe(ProcessingStatus.COMPLETED);
    });
  });

  describe('retries', () => {
    it('should retry service errors until extraction succeeds', async () => {
      const extractText = new ScriptedExtractText([
        new OcrServiceError('Throttled'),
        new OcrServiceError('Throttled'),
        extraction,
      ]);
      const useCase = createUseCase(extractText);

      const result = await useCase.execute(command);

      expect(result.status).toBe(ProcessingStatus.COMPLETED);
      expect(result.attempts).toBe(3);
      expect(extractText.commands).toHaveLength(3);
    });

    it('should stop after the configured number of attempts', async () => {
      const extractText = new ScriptedExtractText([new OcrServiceError('Throttled')]);
      const useCase = createUseCase(extractText);

      const result = await useCase.execute(command);

      expect(extractText.commands).toHaveLength(3);
      expect(result).toMatchObject({
        status: ProcessingStatus.FAILED,
        errorCode: 'OCR_SERVICE_ERROR',
        errorMessage: 'Throttled',
        errorKey: 'errors/report_error.json',
        attempts: 3,
      });
    });

    it('should honour a single configured attempt', async () => {
      const extractText = new ScriptedExtractText([new OcrServiceError('Throttled')]);
      const useCase = createUseCase(extractText, { RETRY_ATTEMPTS: '1' });

      const result = await useCase.execute(command);

      expect(extractText.commands).toHaveLength(1);
      expect(result.attempts).toBe(1);
    });

    it('should retry errors from outside the domain', async () => {
      const extractText = new ScriptedExtractText([new Error('socket hang up'), extraction]);
      const useCase = createUseCase(extractText);

      const result = await useCase.execute(command);

      expect(result.status).toBe(ProcessingStatus.COMPLETED);
      expect(result.attempts).toBe(2);
    });

    it('should never retry a validation error', async () => {
      const extractText = new ScriptedExtractText([new DocumentValidationError('Document is empty')]);
      const useCase = createUseCase(extractText);

      const result = await useCase.execute(command);

      expect(extractText.commands).toHaveLength(1);
      expect(result).toMatchObject({
        status: ProcessingStatus.FAILED,
        errorCode: 'VALIDATION_FAILED',
        errorMessage: 'Document is empty',
        attempts: 1,
      });
    });

    it('should report a timeout without retrying', async () => {
      const extractText = new ScriptedExtractText([
        new ExtractionTimeoutError('Text detection job job-1 did not finish within 300000 ms'),
      ]);
      const useCase = createUseCase(extractText);

      const result = await useCase.execute(command);

      expect(extractText.commands).toHaveLength(1);
      expect(result.status).toBe(ProcessingStatus.TIMEOUT);
    });
  });

  describe('retry delay', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should wait the configured delay before each retry', async () => {
      const extractText = new ScriptedExtractText([
        new OcrServiceError('Throttled'),
        new OcrServiceError('Throttled'),
        extraction,
      ]);
      const useCase = createUseCase(extractText, { RETRY_DELAY_MS: '2000' });

      const execution = useCase.execute(command);

      await vi.advanceTimersByTimeAsync(1999);
      expect(extractText.commands).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(extractText.commands).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(2000);
      const result = await execution;

      expect(extractText.commands).toHaveLength(3);
      expect(result.status).toBe(ProcessingStatus.COMPLETED);
      expect(result.attempts).toBe(3);
    });

    it('should not wait after the last attempt', async () => {
      const extractText = new ScriptedExtractText([new OcrServiceError('Throttled')]);
      const useCase = createUseCase(extractText, { RETRY_DELAY_MS: '2000', RETRY_ATTEMPTS: '2' });

      const execution = useCase.execute(command);
      await vi.advanceTimersByTimeAsync(2000);

      const result = await execution;
      expect(extractText.commands).toHaveLength(2);
      expect(result.attempts).toBe(2);
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('failures', () => {
    it('should write an error document and publish document.failed', async () => {
      const useCase = createUseCase(
        new ScriptedExtractText([new DocumentValidationError('Document is empty')]),
      );

      await useCase.execute(command);

      expect(storage.getJson(TEST_BUCKET, 'errors/report_error.json')).toMatchObject({
        originalFile: 'input/report.pdf',
        bucket: TEST_BUCKET,
        status: 'failed',
        attempts: 1,
        error: {
          errorType: 'DocumentValidationError',
          code: 'VALIDATION_FAILED',
          message: 'Document is empty',
          retryable: false,
        },
      });
      expect(storage.listKeys(TEST_BUCKET)).toEqual(['errors/report_error.json']);
      expect(publisher.getEventNames()).toEqual(['document.failed']);
    });

    it('should turn an output write failure into a failed result', async () => {
      storage.failWritesTo('metadata/report.json');
      const useCase = createUseCase(new ScriptedExtractText([extraction]));

      const result = await useCase.execute(command);

      expect(result).toMatchObject({
        status: ProcessingStatus.FAILED,
        errorCode: 'UNKNOWN',
        errorMessage: 'Simulated write failure for metadata/report.json',
        errorKey: 'errors/report_error.json',
        attempts: 1,
      });
      expect(storage.getStored(TEST_BUCKET, 'text/report.txt')).toBeUndefined();
      expect(storage.listKeys(TEST_BUCKET)).toEqual(['errors/report_error.json']);
      expect(publisher.getEventNames()).toEqual(['document.failed']);
    });

    it('should still write the error document when the partial text cannot be removed', async () => {
      storage.failWritesTo('metadata/report.json');
      storage.failDeletesOf('text/report.txt');
      const useCase = createUseCase(new ScriptedExtractText([extraction]));

      const result = await useCase.execute(command);

      expect(result).toMatchObject({
        status: ProcessingStatus.FAILED,
        errorMessage: 'Simulated write failure for metadata/report.json',
        errorKey: 'errors/report_error.json',
      });
      expect(storage.listKeys(TEST_BUCKET)).toEqual(['errors/report_error.json', 'text/report.txt']);
    });

    it('should resolve without an error key when the error document cannot be written', async () => {
      storage.failWritesTo('errors/report_error.json');
      const useCase = createUseCase(
        new ScriptedExtractText([new DocumentValidationError('Document is empty')]),
      );

      const result = await useCase.execute(command);

      expect(result.status).toBe(ProcessingStatus.FAILED);
      expect(result).not.toHaveProperty('errorKey');
    });
  });
});
