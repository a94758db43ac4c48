export type FetchResult =
  | { success: true; attempts: number; filePath: string; keyCount: number }
  | { success: false; attempts: number; error: string };

/**
 * Downloads one (language, namespace) pair to a local file with retries
 */
export interface TranslationFetcher {
  fetch(language: string, namespace: string, destinationPath: string): Promise<FetchResult>;
}
