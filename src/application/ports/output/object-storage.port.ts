export const OBJECT_STORAGE_PORT = 'ObjectStoragePort';

/**
 * Put Object Options
 */
export interface PutObjectOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

/**
 * Put Object Result
 */
export interface PutObjectResult {
  bucket: string;
  key: string;
  etag: string;
  location: string;
}

/**
 * Stored object description, as returned by head and list operations
 */
export interface ObjectInfo {
  key: string;
  size: number;
  contentType?: string;
  etag?: string;
  lastModified?: Date;
}

/**
 * Object Storage Port (Driven Port)
 * Interface for bucket operations (S3). Keys are plain strings with
 * folder-like prefixes.
 */
export interface ObjectStoragePort {
  /**
   * Store a string or byte payload under a key, replacing any existing object
   */
  putObject(
    bucket: string,
    key: string,
    body: string | Uint8Array,
    options?: PutObjectOptions,
  ): Promise<PutObjectResult>;

  /**
   * Read a whole object into memory
   */
  getObject(bucket: string, key: string): Promise<Uint8Array>;

  /**
   * Describe an object, or null when it does not exist
   */
  headObject(bucket: string, key: string): Promise<ObjectInfo | null>;

  /**
   * List every object under a prefix
   */
  listObjects(bucket: string, prefix: string): Promise<ObjectInfo[]>;

  objectExists(bucket: string, key: string): Promise<boolean>;

  deleteObject(bucket: string, key: string): Promise<void>;

  deleteObjects(bucket: string, keys: string[]): Promise<void>;
}
