import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import type { ExtractTextCommand, ExtractTextPort } from '../ports/input/extract-text.port';
import { OBJECT_STORAGE_PORT } from '../ports/output/object-storage.port';
import type { ObjectStoragePort } from '../ports/output/object-storage.port';
import { OCR_GATEWAY_PORT } from '../ports/output/ocr-gateway.port';
import type { OcrGatewayPort, TextDetectionJobPage } from '../ports/output/ocr-gateway.port';
import { ExtractionResult } from '../../domain/entities/extraction-result.entity';
import { ConfidenceStatsVO } from '../../domain/value-objects/confidence-stats.vo';
import { DocumentKeyLayoutVO } from '../../domain/value-objects/document-key-layout.vo';
import {
  ExtractionMethod,
  selectExtractionMethod,
} from '../../domain/value-objects/extraction-method.vo';
import {
  OcrBlock,
  OcrBlockType,
  OcrJobStatus,
  compareReadingOrder,
} from '../../domain/value-objects/ocr-block.vo';
import {
  ValidationResult,
  invalidResult,
  validResult,
} from '../../domain/value-objects/validation-result.vo';
import {
  DocumentValidationError,
  ExtractionQualityError,
  ExtractionTimeoutError,
  OcrServiceError,
  UnsupportedDocumentError,
} from '../../domain/errors/extraction.errors';

const PDF_CONTENT_TYPES = ['application/pdf', 'application/x-pdf'];

interface RawExtraction {
  blocks: OcrBlock[];
  pageCount?: number;
  jobId?: string;
  warnings: string[];
}

type TextBlock = OcrBlock & { text: string };

/**
 * Extract Text Use Case (Extraction Orchestrator)
 *
 * Small documents are read from the bucket and sent inline to the synchronous
 * detection endpoint; documents at or above the size threshold are submitted
 * as an asynchronous job that is polled until it finishes or the wait budget
 * runs out. A small document the synchronous endpoint cannot read (several
 * pages) goes through the asynchronous job instead. Timeouts, validation and quality failures are raised as
 * non-retryable errors; retrying is the caller's decision.
 */
@Injectable()
export class ExtractTextUseCase implements ExtractTextPort {
  private readonly logger = new Logger(ExtractTextUseCase.name);
  private readonly settings: AppConfig['extraction'];
  private readonly layout: DocumentKeyLayoutVO;

  constructor(
    @Inject(OBJECT_STORAGE_PORT) private readonly objectStorage: ObjectStoragePort,
    @Inject(OCR_GATEWAY_PORT) private readonly ocrGateway: OcrGatewayPort,
    configService: ConfigService<AppConfig>,
  ) {
    this.settings = configService.getOrThrow('extraction', { infer: true });
    this.layout = DocumentKeyLayoutVO.create(configService.getOrThrow('s3', { infer: true }));
  }

  async execute(command: ExtractTextCommand): Promise<ExtractionResult> {
    const { bucket, key } = command;
    const startedAt = Date.now();

    const validation = await this.validateDocument(bucket, key);
    if (!validation.isValid) {
      const message = validation.errorMessage ?? 'Document validation failed';
      const details = { bucket, key, fileSize: validation.fileSize, format: validation.format };
      throw this.layout.hasSupportedExtension(key)
        ? new DocumentValidationError(message, { details })
        : new UnsupportedDocumentError(message, { details });
    }

    const selected = selectExtractionMethod(validation.fileSize, this.settings.syncSizeLimitBytes);
    this.logger.log(
      `Extracting s3://${bucket}/${key} (${validation.fileSize} bytes) with ${selected} method`,
    );

    const { raw, method } =
      selected === ExtractionMethod.SYNC
        ? await this.extractSyncWithFallback(command)
        : { raw: await this.extractAsync(command), method: ExtractionMethod.ASYNC };

    const result = this.assemble(raw, method, Date.now() - startedAt, validation.warnings);

    this.logger.log(
      `Extracted ${result.characterCount} characters from ${result.pageCount} page(s) of ${key} ` +
        `(average confidence ${result.confidence.toJSON().averageConfidence})`,
    );

    if (this.settings.failOnLowQuality && !result.isHighQuality) {
      throw new ExtractionQualityError(
        `Extraction quality below threshold for ${key}: average confidence ` +
          `${result.confidence.toJSON().averageConfidence}, ` +
          `${result.confidence.lowConfidenceBlocks}/${result.confidence.totalBlocks} low-confidence blocks`,
        { details: { bucket, key, confidence: result.confidence.toJSON() } },
      );
    }

    return result;
  }

  async validateDocument(bucket: string, key: string): Promise<ValidationResult> {
    const format = DocumentKeyLayoutVO.extensionOf(key);

    if (!this.layout.hasSupportedExtension(key)) {
      return invalidResult(
        `Unsupported document format "${format || 'none'}", expected ${this.layout.inputExtension}`,
        { format },
      );
    }

    const info = await this.objectStorage.headObject(bucket, key);
    if (!info) {
      return invalidResult(`Document not found: s3://${bucket}/${key}`, { format });
    }

    const details = { fileSize: info.size, format, contentType: info.contentType };

    if (info.size === 0) {
      return invalidResult('Document is empty', details);
    }

    if (info.size > this.settings.maxDocumentSizeBytes) {
      return invalidResult(
        `Document size ${info.size} bytes exceeds the maximum of ${this.settings.maxDocumentSizeBytes} bytes`,
        details,
      );
    }

    const warnings: string[] = [];
    if (format === 'pdf' && info.contentType && !PDF_CONTENT_TYPES.includes(info.contentType)) {
      warnings.push(`Unexpected content type "${info.contentType}" for a PDF document`);
    }
    if (info.size >= this.settings.syncSizeLimitBytes) {
      warnings.push(
        `Document size ${info.size} bytes is at or above the synchronous limit of ` +
          `${this.settings.syncSizeLimitBytes} bytes; asynchronous extraction will be used`,
      );
    }

    return validResult({ ...details, warnings });
  }

  private async extractSync(command: ExtractTextCommand): Promise<RawExtraction> {
    const document = await this.objectStorage.getObject(command.bucket, command.key);
    const output = await this.ocrGateway.detectText(document);

    return { blocks: output.blocks, pageCount: output.pageCount, warnings: [] };
  }

  /**
   * Synchronous detection only reads single-page documents; anything it
   * rejects as unsupported is resubmitted as an asynchronous job.
   */
  private async extractSyncWithFallback(
    command: ExtractTextCommand,
  ): Promise<{ raw: RawExtraction; method: ExtractionMethod }> {
    try {
      return { raw: await this.extractSync(command), method: ExtractionMethod.SYNC };
    } catch (error) {
      if (!(error instanceof UnsupportedDocumentError)) {
        throw error;
      }

      this.logger.warn(
        `Synchronous detection rejected ${command.key} (${error.message}), retrying as an asynchronous job`,
      );
      const raw = await this.extractAsync(command);
      return {
        raw: {
          ...raw,
          warnings: [
            `Synchronous detection rejected the document (${error.message}); ` +
              'asynchronous extraction was used',
            ...raw.warnings,
          ],
        },
        method: ExtractionMethod.ASYNC,
      };
    }
  }

  private async extractAsync(command: ExtractTextCommand): Promise<RawExtraction> {
    const jobId = await this.ocrGateway.startTextDetection(command);
    this.logger.log(`Started text detection job ${jobId} for ${command.key}`);

    const firstPage = await this.waitForJob(jobId);

    const blocks = [...firstPage.blocks];
    const warnings = [...firstPage.warnings];
    let pageCount = firstPage.pageCount;
    let nextToken = firstPage.nextToken;
    let resultPages = 1;

    if (firstPage.status === OcrJobStatus.PARTIAL_SUCCESS) {
      warnings.push(`Text detection job ${jobId} finished with partial success`);
    }

    while (nextToken) {
      const page = await this.ocrGateway.getTextDetection(jobId, nextToken);
      blocks.push(...page.blocks);
      warnings.push(...page.warnings);
      pageCount = pageCount ?? page.pageCount;
      nextToken = page.nextToken;
      resultPages++;
    }

    this.logger.debug(`Collected ${blocks.length} blocks in ${resultPages} result page(s) for job ${jobId}`);

    return { blocks, pageCount, jobId, warnings };
  }

  /**
   * Polls until the job leaves IN_PROGRESS and returns its first result page.
   */
  private async waitForJob(jobId: string): Promise<TextDetectionJobPage> {
    const { maxWaitTimeMs, pollIntervalMs } = this.settings;
    const deadline = Date.now() + maxWaitTimeMs;

    for (let attempt = 1; ; attempt++) {
      const page = await this.ocrGateway.getTextDetection(jobId);

      if (page.status === OcrJobStatus.SUCCEEDED || page.status === OcrJobStatus.PARTIAL_SUCCESS) {
        return page;
      }

      if (page.status === OcrJobStatus.FAILED) {
        throw new OcrServiceError(
          `Text detection job ${jobId} failed: ${page.statusMessage ?? 'Unknown error'}`,
          { details: { jobId } },
        );
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ExtractionTimeoutError(
          `Text detection job ${jobId} did not finish within ${maxWaitTimeMs} ms`,
          { details: { jobId, polls: attempt } },
        );
      }

      this.logger.debug(`Job ${jobId} still in progress after poll ${attempt}`);
      await this.delay(Math.min(pollIntervalMs, remaining));
    }
  }

  private assemble(
    raw: RawExtraction,
    method: ExtractionMethod,
    processingTimeMs: number,
    validationWarnings: ReadonlyArray<string>,
  ): ExtractionResult {
    const lines = raw.blocks
      .filter((block): block is TextBlock => block.blockType === OcrBlockType.LINE && !!block.text)
      .sort(compareReadingOrder);

    return ExtractionResult.create({
      text: lines.map((line) => line.text).join('\n'),
      confidence: ConfidenceStatsVO.fromBlocks(raw.blocks, this.settings.minConfidenceThreshold),
      method,
      pageCount: raw.pageCount ?? countPages(raw.blocks),
      processingTimeMs,
      jobId: raw.jobId,
      warnings: [...validationWarnings, ...raw.warnings],
      qualityThresholds: {
        minAverageConfidence: this.settings.minAverageConfidence,
        maxLowConfidenceRatio: this.settings.maxLowConfidenceRatio,
      },
    });
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function countPages(blocks: ReadonlyArray<OcrBlock>): number {
  const pageBlocks = blocks.filter((block) => block.blockType === OcrBlockType.PAGE).length;
  if (pageBlocks > 0) {
    return pageBlocks;
  }
  return blocks.reduce((highest, block) => Math.max(highest, block.page), 1);
}
