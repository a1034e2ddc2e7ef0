/**
 * Validation Result Value Object
 * Outcome of checking a stored document before extraction
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly fileSize: number;
  /** Lower-case extension without the dot, e.g. `pdf` */
  readonly format: string;
  readonly contentType?: string;
  readonly errorMessage?: string;
  readonly warnings: ReadonlyArray<string>;
}

export function validResult(
  props: Omit<ValidationResult, 'isValid' | 'errorMessage'>,
): ValidationResult {
  return { ...props, isValid: true };
}

export function invalidResult(
  errorMessage: string,
  props: Partial<Omit<ValidationResult, 'isValid' | 'errorMessage'>> = {},
): ValidationResult {
  return {
    fileSize: props.fileSize ?? 0,
    format: props.format ?? '',
    contentType: props.contentType,
    warnings: props.warnings ?? [],
    isValid: false,
    errorMessage,
  };
}
