import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import type {
  ListProcessedDocumentsPort,
  ProcessedDocument,
} from '../ports/input/list-processed-documents.port';
import { OBJECT_STORAGE_PORT } from '../ports/output/object-storage.port';
import type { ObjectStoragePort } from '../ports/output/object-storage.port';
import { DocumentKeyLayoutVO } from '../../domain/value-objects/document-key-layout.vo';

/**
 * List Processed Documents Use Case
 * Read side over the text and metadata outputs already stored in the bucket
 */
@Injectable()
export class ListProcessedDocumentsUseCase implements ListProcessedDocumentsPort {
  private readonly logger = new Logger(ListProcessedDocumentsUseCase.name);
  private readonly layout: DocumentKeyLayoutVO;

  constructor(
    @Inject(OBJECT_STORAGE_PORT) private readonly objectStorage: ObjectStoragePort,
    configService: ConfigService<AppConfig>,
  ) {
    this.layout = DocumentKeyLayoutVO.create(configService.getOrThrow('s3', { infer: true }));
  }

  async list(bucket: string): Promise<ProcessedDocument[]> {
    const objects = await this.objectStorage.listObjects(bucket, this.layout.textPrefix);
    const documents: ProcessedDocument[] = [];

    for (const object of objects) {
      const name = this.layout.documentNameFromTextKey(object.key);
      if (name === null) {
        continue;
      }
      documents.push({
        name,
        textKey: object.key,
        metadataKey: this.layout.metadataKeyForName(name),
        textSize: object.size,
        processedAt: object.lastModified,
      });
    }

    this.logger.debug(`Found ${documents.length} processed document(s) in ${bucket}`);
    return documents.sort((a, b) => a.name.localeCompare(b.name));
  }

  async getExtractedText(bucket: string, name: string): Promise<string | null> {
    const textKey = this.layout.textKeyForName(name);
    if (!(await this.objectStorage.objectExists(bucket, textKey))) {
      return null;
    }
    const bytes = await this.objectStorage.getObject(bucket, textKey);
    return Buffer.from(bytes).toString('utf-8');
  }
}
