import type { ExtractionResult } from '../../../domain/entities/extraction-result.entity';
import type { ValidationResult } from '../../../domain/value-objects/validation-result.vo';

export const EXTRACT_TEXT_PORT = 'ExtractTextPort';

/**
 * Extract Text Command
 */
export interface ExtractTextCommand {
  bucket: string;
  key: string;
}

/**
 * Extract Text Port (Driving Port / Use Case Interface)
 * Validates a stored document, picks the synchronous or asynchronous OCR path
 * and assembles the extraction result
 */
export interface ExtractTextPort {
  execute(command: ExtractTextCommand): Promise<ExtractionResult>;

  validateDocument(bucket: string, key: string): Promise<ValidationResult>;
}
