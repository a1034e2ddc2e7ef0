import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { EXTRACT_TEXT_PORT } from '../ports/input/extract-text.port';
import type { ExtractTextPort } from '../ports/input/extract-text.port';
import type {
  ProcessDocumentCommand,
  ProcessDocumentPort,
} from '../ports/input/process-document.port';
import { OBJECT_STORAGE_PORT } from '../ports/output/object-storage.port';
import type { ObjectStoragePort } from '../ports/output/object-storage.port';
import { EVENT_PUBLISHER_PORT } from '../ports/output/event-publisher.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import { ExtractionResult } from '../../domain/entities/extraction-result.entity';
import {
  CompletedProcessingResult,
  FailedProcessingResult,
  ProcessingResult,
} from '../../domain/entities/processing-result.entity';
import { DocumentKeyLayoutVO } from '../../domain/value-objects/document-key-layout.vo';
import { ProcessingStatus } from '../../domain/value-objects/processing-status.vo';
import {
  ExtractionError,
  ExtractionTimeoutError,
  describeError,
  isRetryableError,
} from '../../domain/errors/extraction.errors';
import { DomainEvent, DocumentFailedEvent, DocumentProcessedEvent } from '../../domain/events';

type AttemptOutcome =
  | { ok: true; extraction: ExtractionResult; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Process Document Use Case (Document Processor)
 * Runs the extraction with bounded retries and stores its outputs, or an error
 * document describing why it stopped. Every outcome is returned as a
 * ProcessingResult.
 */
@Injectable()
export class ProcessDocumentUseCase implements ProcessDocumentPort {
  private readonly logger = new Logger(ProcessDocumentUseCase.name);
  private readonly retry: AppConfig['retry'];
  private readonly layout: DocumentKeyLayoutVO;

  constructor(
    @Inject(EXTRACT_TEXT_PORT) private readonly extractText: ExtractTextPort,
    @Inject(OBJECT_STORAGE_PORT) private readonly objectStorage: ObjectStoragePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    configService: ConfigService<AppConfig>,
  ) {
    this.retry = configService.getOrThrow('retry', { infer: true });
    this.layout = DocumentKeyLayoutVO.create(configService.getOrThrow('s3', { infer: true }));
  }

  async execute(command: ProcessDocumentCommand): Promise<ProcessingResult> {
    const { bucket, key } = command;
    this.logger.log(`Processing document s3://${bucket}/${key}`);

    const outcome = await this.extractWithRetry(command);
    if (!outcome.ok) {
      return this.fail(command, outcome.error, outcome.attempts);
    }

    try {
      const result = await this.storeOutputs(command, outcome.extraction, outcome.attempts);
      await this.publish(
        new DocumentProcessedEvent({
          bucket,
          key,
          textKey: result.textKey,
          metadataKey: result.metadataKey,
          method: result.extraction.method,
          pageCount: result.extraction.pageCount,
          characterCount: result.extraction.characterCount,
          averageConfidence: result.extraction.confidence.toJSON().averageConfidence,
          isHighQuality: result.extraction.isHighQuality,
          attempts: result.attempts,
        }),
      );

      this.logger.log(
        `Document ${key} completed after ${result.attempts} attempt(s): ${result.textKey}`,
      );
      return result;
    } catch (error) {
      this.logger.error(`Failed to store outputs for ${key}`, error);
      await this.discardTextOutput(command);
      return this.fail(command, error, outcome.attempts);
    }
  }

  /**
   * A text object without its metadata would be listed as processed.
   */
  private async discardTextOutput(command: ProcessDocumentCommand): Promise<void> {
    const textKey = this.layout.textKeyFor(command.key);
    try {
      await this.objectStorage.deleteObject(command.bucket, textKey);
    } catch (deleteError) {
      this.logger.error(`Failed to remove partial output ${textKey}`, deleteError);
    }
  }

  private async extractWithRetry(command: ProcessDocumentCommand): Promise<AttemptOutcome> {
    const maxAttempts = Math.max(1, this.retry.attempts);
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        const extraction = await this.extractText.execute(command);
        return { ok: true, extraction, attempts: attempt };
      } catch (error) {
        const { type, message } = describeError(error);

        if (!isRetryableError(error)) {
          this.logger.warn(`${type} for ${command.key} is not retryable: ${message}`);
          return { ok: false, error, attempts: attempt };
        }

        if (attempt >= maxAttempts) {
          this.logger.error(
            `Giving up on ${command.key} after ${attempt} attempt(s): ${type}: ${message}`,
          );
          return { ok: false, error, attempts: attempt };
        }

        this.logger.warn(
          `Attempt ${attempt}/${maxAttempts} for ${command.key} failed (${type}: ${message}), ` +
            `retrying in ${this.retry.delayMs}ms`,
        );
        await this.delay(this.retry.delayMs);
      }
    }
  }

  private async storeOutputs(
    command: ProcessDocumentCommand,
    extraction: ExtractionResult,
    attempts: number,
  ): Promise<CompletedProcessingResult> {
    const { bucket, key } = command;
    const textKey = this.layout.textKeyFor(key);
    const metadataKey = this.layout.metadataKeyFor(key);
    const processedAt = new Date();

    await this.objectStorage.putObject(bucket, textKey, extraction.text, {
      contentType: 'text/plain; charset=utf-8',
      metadata: { 'source-key': encodeURIComponent(key) },
    });

    const metadata = {
      originalFile: key,
      bucket,
      status: ProcessingStatus.COMPLETED,
      textFile: textKey,
      extraction: ExtractionResult.toJSON(extraction),
      attempts,
      processedAt: processedAt.toISOString(),
    };

    await this.objectStorage.putObject(bucket, metadataKey, JSON.stringify(metadata, null, 2), {
      contentType: 'application/json',
      metadata: { 'source-key': encodeURIComponent(key) },
    });

    return ProcessingResult.completed({
      bucket,
      originalKey: key,
      textKey,
      metadataKey,
      extraction,
      attempts,
      processedAt,
    });
  }

  private async fail(
    command: ProcessDocumentCommand,
    error: unknown,
    attempts: number,
  ): Promise<FailedProcessingResult> {
    const { bucket, key } = command;
    const description = describeError(error);
    const status =
      error instanceof ExtractionTimeoutError ? ProcessingStatus.TIMEOUT : ProcessingStatus.FAILED;
    const processedAt = new Date();
    const errorKey = this.layout.errorKeyFor(key);

    const errorDocument = {
      originalFile: key,
      bucket,
      status,
      error: error instanceof ExtractionError ? error.toJSON() : description,
      attempts,
      processedAt: processedAt.toISOString(),
    };

    let writtenErrorKey: string | undefined;
    try {
      await this.objectStorage.putObject(bucket, errorKey, JSON.stringify(errorDocument, null, 2), {
        contentType: 'application/json',
        metadata: { 'source-key': encodeURIComponent(key) },
      });
      writtenErrorKey = errorKey;
    } catch (writeError) {
      this.logger.error(`Failed to write error document ${errorKey}`, writeError);
    }

    const result = ProcessingResult.failed({
      bucket,
      originalKey: key,
      status,
      errorCode: description.code,
      errorMessage: description.message || description.type,
      errorKey: writtenErrorKey,
      attempts,
      processedAt,
    });

    await this.publish(
      new DocumentFailedEvent({
        bucket,
        key,
        status,
        errorCode: result.errorCode,
        errorMessage: result.errorMessage,
        errorKey: result.errorKey,
        attempts,
      }),
    );

    this.logger.warn(`Document ${key} ended with status ${status}: ${result.errorMessage}`);
    return result;
  }

  private async publish(event: DomainEvent): Promise<void> {
    try {
      await this.eventPublisher.publish(event);
    } catch (error) {
      this.logger.error(`Failed to publish ${event.eventName} event`, error);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
