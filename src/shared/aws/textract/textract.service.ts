import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import {
  TextractClient,
  DetectDocumentTextCommand,
  DetectDocumentTextCommandOutput,
  StartDocumentTextDetectionCommand,
  GetDocumentTextDetectionCommand,
  GetDocumentTextDetectionCommandOutput,
} from '@aws-sdk/client-textract';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export const TEXTRACT_CLIENT = 'TEXTRACT_CLIENT';

// Largest page GetDocumentTextDetection returns
const MAX_RESULTS_PER_PAGE = 1000;

@Injectable()
export class TextractService implements OnModuleDestroy {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(TEXTRACT_CLIENT) private readonly client: TextractClient,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(TextractService.name);
  }

  /**
   * Synchronous detection on inline bytes (single request, 5 MB limit).
   */
  async detectDocumentText(document: Uint8Array): Promise<DetectDocumentTextCommandOutput> {
    this.logger.debug({ size: document.length }, 'Calling DetectDocumentText');

    return this.client.send(new DetectDocumentTextCommand({ Document: { Bytes: document } }));
  }

  async startDocumentTextDetection(bucket: string, key: string): Promise<string> {
    const response = await this.client.send(
      new StartDocumentTextDetectionCommand({
        DocumentLocation: { S3Object: { Bucket: bucket, Name: key } },
      }),
    );

    if (!response.JobId) {
      throw new Error(`StartDocumentTextDetection returned no job id for s3://${bucket}/${key}`);
    }

    this.logger.info({ bucket, key, jobId: response.JobId }, 'Text detection job started');
    return response.JobId;
  }

  async getDocumentTextDetection(
    jobId: string,
    nextToken?: string,
  ): Promise<GetDocumentTextDetectionCommandOutput> {
    const response = await this.client.send(
      new GetDocumentTextDetectionCommand({
        JobId: jobId,
        MaxResults: MAX_RESULTS_PER_PAGE,
        NextToken: nextToken,
      }),
    );

    this.logger.debug(
      { jobId, status: response.JobStatus, blocks: response.Blocks?.length ?? 0 },
      'Text detection job polled',
    );
    return response;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
