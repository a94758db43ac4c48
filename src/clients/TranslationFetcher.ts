import { writeFile, rename, rm } from 'fs/promises';
import { basename } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { LocizeClient } from '../interfaces/LocizeClient';
import { Logger } from '../interfaces/Logger';
import { BackupConfig } from '../interfaces/BackupConfig';
import {
  TranslationFetcher as ITranslationFetcher,
  FetchResult,
} from '../interfaces/TranslationFetcher';
import { withRetry, RetryExhaustedError, formatError, sleep as defaultSleep } from '../utils/retry';

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly language: string,
    public readonly namespace: string,
    public readonly attempts: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class InvalidBundleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBundleError';
  }
}

/**
 * Parse a downloaded body and check it is a JSON object or array
 */
export function validateBundle(body: string): object {
  if (body.trim().length === 0) {
    throw new InvalidBundleError('Empty response body');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new InvalidBundleError(`Invalid JSON: ${formatError(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    const kind = parsed === null ? 'null' : typeof parsed;
    throw new InvalidBundleError(`Expected a JSON object or array, got ${kind}`);
  }

  return parsed;
}

/**
 * Number of leaf values (translations) in a bundle, nested keys included
 */
export function countKeys(value: unknown): number {
  if (typeof value !== 'object' || value === null) {
    return 1;
  }
  return Object.values(value).reduce<number>((total, child) => total + countKeys(child), 0);
}

export class TranslationFetcher implements ITranslationFetcher {
  constructor(
    private readonly locize: LocizeClient,
    private readonly config: Pick<BackupConfig, 'maxRetries' | 'retryDelaySeconds'>,
    private readonly logger: Logger,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  async fetch(language: string, namespace: string, destinationPath: string): Promise<FetchResult> {
    const pair = `${language}/${namespace}`;
    const maxAttempts = this.config.maxRetries;

    try {
      const { value: keyCount, attempts } = await withRetry(
        async attempt => {
          this.logger.debug(`Download attempt ${attempt}/${maxAttempts} for ${pair}`);
          const body = await this.locize.downloadNamespace(language, namespace);
          const bundle = validateBundle(body);
          await this.writeAtomically(destinationPath, body);
          return countKeys(bundle);
        },
        `download ${pair}`,
        {
          maxAttempts,
          delayMs: this.config.retryDelaySeconds * 1000,
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(`Download failed (attempt ${attempt}/${maxAttempts}): ${pair}`, {
              error: formatError(error),
              retryInMs: delayMs,
            });
          },
          sleep: this.sleep,
        }
      );

      this.logger.debug(`Downloaded and validated: ${basename(destinationPath)}`, { keyCount });
      return { success: true, attempts, filePath: destinationPath, keyCount };
    } catch (error) {
      const attempts = error instanceof RetryExhaustedError ? error.attempt : 1;
      const cause = error instanceof RetryExhaustedError ? error.cause : error;
      const fetchError = new FetchError(
        `Failed to download after ${attempts} attempts: ${pair}`,
        language,
        namespace,
        attempts,
        cause
      );
      this.logger.error(fetchError.message, fetchError, { lastError: formatError(cause) });
      return { success: false, attempts, error: formatError(cause) };
    }
  }

  /**
   * Write through a scratch file so the destination only ever holds a
   * complete bundle
   */
  private async writeAtomically(destinationPath: string, body: string): Promise<void> {
    const scratchPath = `${destinationPath}.${uuidv4()}.partial`;
    try {
      await writeFile(scratchPath, body, 'utf8');
      await rename(scratchPath, destinationPath);
    } catch (error) {
      await rm(scratchPath, { force: true });
      throw error;
    }
  }
}
