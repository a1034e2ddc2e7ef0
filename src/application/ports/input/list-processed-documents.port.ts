export const LIST_PROCESSED_DOCUMENTS_PORT = 'ListProcessedDocumentsPort';

/**
 * A document whose extracted text is stored in the bucket
 */
export interface ProcessedDocument {
  /** Path below the text prefix without extension, e.g. `reports/q1` */
  name: string;
  textKey: string;
  metadataKey: string;
  textSize: number;
  processedAt?: Date;
}

/**
 * List Processed Documents Port (Driving Port / Use Case Interface)
 */
export interface ListProcessedDocumentsPort {
  list(bucket: string): Promise<ProcessedDocument[]>;

  /**
   * Extracted text of one document, or null when none is stored
   */
  getExtractedText(bucket: string, name: string): Promise<string | null>;
}
