/**
 * Interface for reading translation bundles from the locize API
 */
export interface LocizeClient {
  /**
   * Download the raw body of one namespace in one language
   * @returns the response body, unparsed
   */
  downloadNamespace(language: string, namespace: string): Promise<string>;
}
