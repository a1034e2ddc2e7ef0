import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import type {
  DocumentEventRecord,
  HandleDocumentEventsCommand,
  HandleDocumentEventsPort,
  HandleDocumentEventsResult,
  SkippedRecord,
} from '../ports/input/handle-document-events.port';
import { PROCESS_DOCUMENT_PORT } from '../ports/input/process-document.port';
import type { ProcessDocumentPort } from '../ports/input/process-document.port';
import { ProcessingResult } from '../../domain/entities/processing-result.entity';
import { DocumentKeyLayoutVO } from '../../domain/value-objects/document-key-layout.vo';
import { describeError } from '../../domain/errors/extraction.errors';

/**
 * Handle Document Events Use Case (Event Entry Point)
 * Filters "object created" notifications down to documents this service owns
 * and processes them one at a time.
 */
@Injectable()
export class HandleDocumentEventsUseCase implements HandleDocumentEventsPort {
  private readonly logger = new Logger(HandleDocumentEventsUseCase.name);
  private readonly layout: DocumentKeyLayoutVO;
  private readonly expectedBucket?: string;

  constructor(
    @Inject(PROCESS_DOCUMENT_PORT) private readonly processDocument: ProcessDocumentPort,
    configService: ConfigService<AppConfig>,
  ) {
    const s3 = configService.getOrThrow('s3', { infer: true });
    this.layout = DocumentKeyLayoutVO.create(s3);
    this.expectedBucket = s3.bucketName;
  }

  async execute(command: HandleDocumentEventsCommand): Promise<HandleDocumentEventsResult> {
    const startTime = Date.now();
    const prefix = command.correlationId ? `[${command.correlationId}] ` : '';
    const skipped: SkippedRecord[] = [];
    const results: ProcessingResult[] = [];

    this.logger.log(`${prefix}Received ${command.records.length} record(s)`);

    for (const record of command.records) {
      const skip = this.skipReason(record);
      if (skip) {
        this.logger.debug(`${prefix}Skipping s3://${record.bucket}/${record.key}: ${skip.reason}`);
        skipped.push(skip);
        continue;
      }

      results.push(await this.process(record));
    }

    const succeeded = results.filter(ProcessingResult.isCompleted).length;
    const summary: HandleDocumentEventsResult = {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      skipped,
      results,
      durationMs: Date.now() - startTime,
    };

    this.logger.log(
      `${prefix}Processed ${summary.total} document(s): ${summary.succeeded} succeeded, ` +
        `${summary.failed} failed, ${skipped.length} skipped in ${summary.durationMs}ms`,
    );

    return summary;
  }

  private skipReason(record: DocumentEventRecord): SkippedRecord | null {
    if (this.expectedBucket && record.bucket !== this.expectedBucket) {
      return { bucket: record.bucket, key: record.key, reason: 'unexpected_bucket' };
    }

    const evaluation = this.layout.evaluate(record.key);
    if (!evaluation.accepted) {
      return { bucket: record.bucket, key: record.key, reason: evaluation.reason };
    }

    return null;
  }

  private async process(record: DocumentEventRecord): Promise<ProcessingResult> {
    try {
      return await this.processDocument.execute({ bucket: record.bucket, key: record.key });
    } catch (error) {
      this.logger.error(`Unexpected error processing ${record.key}`, error);
      const description = describeError(error);
      return ProcessingResult.failed({
        bucket: record.bucket,
        originalKey: record.key,
        errorCode: description.code,
        errorMessage: description.message || description.type,
        attempts: 0,
      });
    }
  }
}
