import axios, { AxiosInstance } from 'axios';
import { LocizeClient as ILocizeClient } from '../interfaces/LocizeClient';
import { BackupConfig } from '../interfaces/BackupConfig';

export class LocizeRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LocizeRequestError';
  }
}

// ERR_CANCELED is raised when the per-attempt abort signal fires
const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED'];

/**
 * HTTP client for the locize translation API.
 * Public projects are read from the CDN path, private ones through
 * /private with the API key as bearer token.
 */
export class LocizeClient implements ILocizeClient {
  private http: AxiosInstance;
  private projectId: string;
  private version: string;
  private isPrivate: boolean;
  private timeoutSeconds: number;

  constructor(config: BackupConfig) {
    this.projectId = config.projectId;
    this.version = config.version;
    this.isPrivate = Boolean(config.apiKey);
    this.timeoutSeconds = config.requestTimeoutSeconds;

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (config.apiKey) {
      headers['Authorization'] = `Bearer ${config.apiKey}`;
    }

    this.http = axios.create({
      baseURL: config.locizeApiUrl,
      timeout: config.requestTimeoutSeconds * 1000,
      headers,
      responseType: 'text',
      // Keep the body as received; validation happens in the fetcher
      transformResponse: [(data: unknown) => data],
      validateStatus: status => status >= 200 && status < 300,
    });
  }

  /**
   * Path of one namespace, relative to the API base URL
   */
  buildPath(language: string, namespace: string): string {
    const segments = [this.projectId, this.version, language, namespace]
      .map(segment => encodeURIComponent(segment))
      .join('/');
    return this.isPrivate ? `/private/${segments}` : `/${segments}`;
  }

  async downloadNamespace(language: string, namespace: string): Promise<string> {
    const path = this.buildPath(language, namespace);

    try {
      // axios' own timeout only covers socket idle time; the signal bounds the whole attempt
      const response = await this.http.get<unknown>(path, {
        signal: AbortSignal.timeout(this.timeoutSeconds * 1000),
      });
      const body = response.data;
      if (typeof body === 'string') {
        return body;
      }
      return body === undefined || body === null ? '' : JSON.stringify(body);
    } catch (error) {
      throw this.toRequestError(error, language, namespace);
    }
  }

  private toRequestError(error: unknown, language: string, namespace: string): LocizeRequestError {
    const pair = `${language}/${namespace}`;

    if (axios.isAxiosError(error)) {
      if (TIMEOUT_CODES.includes(error.code ?? '')) {
        return new LocizeRequestError(
          `locize request for ${pair} timed out after ${this.timeoutSeconds}s`,
          undefined,
          error
        );
      }

      const status = error.response?.status;
      if (status === 401 || status === 403) {
        return new LocizeRequestError(
          `locize rejected the credentials for ${pair} (HTTP ${status})`,
          status,
          error
        );
      }
      if (status === 404) {
        return new LocizeRequestError(`locize has no ${pair} in version ${this.version}`, status, error);
      }
      if (status !== undefined) {
        return new LocizeRequestError(`locize request for ${pair} failed with HTTP ${status}`, status, error);
      }

      return new LocizeRequestError(`locize request for ${pair} failed: ${error.message}`, undefined, error);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new LocizeRequestError(`locize request for ${pair} failed: ${message}`, undefined, error);
  }
}
