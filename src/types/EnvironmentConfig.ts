export interface EnvironmentConfig {
  // Required
  LOCIZE_PROJECT_ID: string;

  // Optional
  LOCIZE_API_KEY?: string;
  LOCIZE_LANGUAGES?: string;
  LOCIZE_NAMESPACES?: string;
  LOCIZE_VERSION?: string;
  LOCIZE_API_URL?: string;
  LOCIZE_CLI_TIMEOUT?: string;
  S3_BUCKET_NAME?: string;
  AWS_REGION?: string;
  AWS_ACCESS_KEY_ID?: string;
  AWS_SECRET_ACCESS_KEY?: string;
  AWS_PROFILE?: string;
  AWS_ENDPOINT_URL?: string;
  MAX_RETRIES?: string;
  RETRY_DELAY?: string;
  RATE_LIMIT_DELAY?: string;
  CLEANUP_LOCAL_FILES?: string;
  BACKUP_DIR?: string;
  LOG_LEVEL?: string;
}
