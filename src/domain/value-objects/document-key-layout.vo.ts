/**
 * Document Key Layout Value Object
 * Folder-like prefixes of the bucket and the rules mapping an input key to
 * its text, metadata and error output keys
 */
export interface DocumentKeyLayoutProps {
  inputPrefix: string;
  textPrefix: string;
  metadataPrefix: string;
  errorPrefix: string;
  inputExtension: string;
}

export enum SkipReason {
  OUTSIDE_INPUT_PREFIX = 'outside_input_prefix',
  FOLDER_PLACEHOLDER = 'folder_placeholder',
  UNSUPPORTED_EXTENSION = 'unsupported_extension',
  HIDDEN_OR_SYSTEM_FILE = 'hidden_or_system_file',
}

export type KeyEvaluation = { accepted: true } | { accepted: false; reason: SkipReason };

export const TEXT_OUTPUT_EXTENSION = '.txt';
export const METADATA_OUTPUT_EXTENSION = '.json';
export const ERROR_OUTPUT_SUFFIX = '_error.json';

export class DocumentKeyLayoutVO {
  private constructor(private readonly props: DocumentKeyLayoutProps) {}

  static create(props: DocumentKeyLayoutProps): DocumentKeyLayoutVO {
    DocumentKeyLayoutVO.validate(props);
    return new DocumentKeyLayoutVO({
      ...props,
      inputExtension: props.inputExtension.toLowerCase(),
    });
  }

  private static validate(props: DocumentKeyLayoutProps): void {
    const prefixes: Array<[string, string]> = [
      ['input', props.inputPrefix],
      ['text', props.textPrefix],
      ['metadata', props.metadataPrefix],
      ['error', props.errorPrefix],
    ];

    for (const [name, prefix] of prefixes) {
      if (!prefix || !prefix.endsWith('/')) {
        throw new Error(`The ${name} prefix must be non-empty and end with "/": "${prefix}"`);
      }
    }

    if (!props.inputExtension.startsWith('.') || props.inputExtension.length < 2) {
      throw new Error(`Invalid input extension: "${props.inputExtension}"`);
    }
  }

  get inputPrefix(): string {
    return this.props.inputPrefix;
  }

  get textPrefix(): string {
    return this.props.textPrefix;
  }

  get metadataPrefix(): string {
    return this.props.metadataPrefix;
  }

  get errorPrefix(): string {
    return this.props.errorPrefix;
  }

  get inputExtension(): string {
    return this.props.inputExtension;
  }

  /**
   * Decides whether a newly created object should be processed.
   */
  evaluate(key: string): KeyEvaluation {
    if (!key.startsWith(this.props.inputPrefix)) {
      return { accepted: false, reason: SkipReason.OUTSIDE_INPUT_PREFIX };
    }

    const fileName = DocumentKeyLayoutVO.fileName(key);
    if (fileName.length === 0) {
      return { accepted: false, reason: SkipReason.FOLDER_PLACEHOLDER };
    }

    if (!this.hasSupportedExtension(key)) {
      return { accepted: false, reason: SkipReason.UNSUPPORTED_EXTENSION };
    }

    if (fileName.startsWith('.') || fileName.startsWith('_')) {
      return { accepted: false, reason: SkipReason.HIDDEN_OR_SYSTEM_FILE };
    }

    return { accepted: true };
  }

  hasSupportedExtension(key: string): boolean {
    return key.toLowerCase().endsWith(this.props.inputExtension);
  }

  textKeyFor(key: string): string {
    return `${this.props.textPrefix}${this.documentStem(key)}${TEXT_OUTPUT_EXTENSION}`;
  }

  metadataKeyFor(key: string): string {
    return `${this.props.metadataPrefix}${this.documentStem(key)}${METADATA_OUTPUT_EXTENSION}`;
  }

  errorKeyFor(key: string): string {
    return `${this.props.errorPrefix}${this.documentStem(key)}${ERROR_OUTPUT_SUFFIX}`;
  }

  /**
   * Path below the input prefix without its extension. Keys outside the
   * input prefix contribute only their file name.
   */
  documentStem(key: string): string {
    const relative = key.startsWith(this.props.inputPrefix)
      ? key.slice(this.props.inputPrefix.length)
      : DocumentKeyLayoutVO.fileName(key);
    return stripExtension(relative);
  }

  /**
   * Inverse of textKeyFor for listing: `text/reports/q1.txt` → `reports/q1`.
   */
  documentNameFromTextKey(textKey: string): string | null {
    if (!textKey.startsWith(this.props.textPrefix) || !textKey.endsWith(TEXT_OUTPUT_EXTENSION)) {
      return null;
    }
    const name = textKey.slice(this.props.textPrefix.length, -TEXT_OUTPUT_EXTENSION.length);
    return name.length > 0 ? name : null;
  }

  textKeyForName(documentName: string): string {
    return `${this.props.textPrefix}${documentName}${TEXT_OUTPUT_EXTENSION}`;
  }

  metadataKeyForName(documentName: string): string {
    return `${this.props.metadataPrefix}${documentName}${METADATA_OUTPUT_EXTENSION}`;
  }

  static fileName(key: string): string {
    return key.slice(key.lastIndexOf('/') + 1);
  }

  static extensionOf(key: string): string {
    const fileName = DocumentKeyLayoutVO.fileName(key);
    const dot = fileName.lastIndexOf('.');
    return dot > 0 ? fileName.slice(dot + 1).toLowerCase() : '';
  }
}

function stripExtension(path: string): string {
  const slash = path.lastIndexOf('/');
  const dot = path.lastIndexOf('.');
  return dot > slash + 1 ? path.slice(0, dot) : path;
}
