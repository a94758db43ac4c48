/**
 * Provenance metadata attached to every uploaded object
 */
export interface UploadMetadata {
  source: string;

  /** Upload time in epoch seconds */
  timestamp: string;

  /** locize version the content was taken from */
  version: string;
}

/**
 * Interface for S3 operations
 */
export interface S3Client {
  /** Upload a file to S3, returns the s3:// location */
  uploadFile(filePath: string, key: string, metadata: UploadMetadata): Promise<string>;

  /** Test S3 connectivity and permissions */
  testConnection(): Promise<boolean>;
}
