/**
 * Artifact download with a per-attempt timeout and a capped retry policy.
 */

import { logger } from '../../utils/logger.js';
import { DownloadFailedError, TimeoutError } from '../../utils/errors.js';
import { MAX_DOWNLOAD_RETRIES } from '../../constants/index.js';

export interface FetchOptions {
  timeoutMs: number;
}

export interface ArtifactFetcher {
  /** Fetch the whole artifact into memory */
  fetch(url: string, options: FetchOptions): Promise<Uint8Array>;
}

export interface RetryPolicy {
  /** Extra attempts after the first one, capped at MAX_DOWNLOAD_RETRIES */
  retries: number;
  /** Delay before retry n is backoffMs * 2^n */
  backoffMs: number;
}

/**
 * Fetches artifacts over HTTP(S) with the global fetch.
 */
export class HttpArtifactFetcher implements ArtifactFetcher {
  async fetch(url: string, options: FetchOptions): Promise<Uint8Array> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetch(url, { signal: controller.signal, redirect: 'follow' });
      if (!response.ok) {
        // 4xx other than 408/429 will not improve on retry
        const retryable = response.status >= 500 || response.status === 408 || response.status === 429;
        throw new DownloadFailedError(url, `HTTP ${response.status} ${response.statusText}`, retryable, {
          status: response.status
        });
      }
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError(`Download of ${url}`, options.timeoutMs);
      }
      if (error instanceof DownloadFailedError) {
        throw error;
      }
      throw new DownloadFailedError(url, error instanceof Error ? error.message : String(error), true);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof DownloadFailedError) return error.retryable;
  return false;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Fetch with exponential backoff. Non-retryable failures and the last
 * attempt's failure propagate unchanged.
 */
export async function fetchWithRetry(
  fetcher: ArtifactFetcher,
  url: string,
  options: FetchOptions,
  policy: RetryPolicy,
  sleep: Sleep = defaultSleep
): Promise<Uint8Array> {
  const attempts = Math.min(Math.max(policy.retries, 0), MAX_DOWNLOAD_RETRIES) + 1;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fetcher.fetch(url, options);
    } catch (error) {
      const isLastAttempt = attempt === attempts - 1;
      if (!isRetryable(error) || isLastAttempt) {
        throw error;
      }
      const delayMs = policy.backoffMs * Math.pow(2, attempt);
      logger.warn(
        `[retry] Download attempt ${attempt + 1}/${attempts} failed, retrying in ${delayMs}ms: ${error instanceof Error ? error.message : String(error)}`
      );
      await sleep(delayMs);
    }
  }
  throw new DownloadFailedError(url, 'retries exhausted', false);
}
