// OUTBOUND HTTP
// Single request path for every provider call: timeout, status check, error logging

import { stat } from 'node:fs/promises';
import { MediaNotFoundError, ProviderError } from './errors';
import { safeReadText } from './utils';

/**
 * Issue a provider request bounded by `timeoutMs`.
 * Non-success statuses throw ProviderError; network failures and timeouts
 * propagate as thrown by fetch.
 */
export async function requestProvider(
  provider: string,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const response = await fetch(url, {
    ...init,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const errorText = await safeReadText(response);
    console.error(`${provider} error ${response.status}: ${errorText ?? ''}`);

    if (response.status === 401) {
      throw new ProviderError(provider, 401, `${provider} API key is invalid`, errorText);
    }
    if (response.status === 429) {
      throw new ProviderError(provider, 429, `${provider} rate limit exceeded`, errorText);
    }

    throw new ProviderError(provider, response.status, `${provider} error: ${response.status}`, errorText);
  }

  return response;
}

export async function requestProviderJson(
  provider: string,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<unknown> {
  const response = await requestProvider(provider, url, init, timeoutMs);
  return response.json();
}

/**
 * GET remote media. Any non-success status aborts the download.
 */
export async function downloadMedia(url: string, timeoutMs: number): Promise<Response> {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });

  if (!response.ok) {
    console.error(`Media download error ${response.status}: ${url}`);
    throw new ProviderError('media', response.status, `Media download failed: ${response.status}`);
  }

  return response;
}

/**
 * Fail with MediaNotFoundError unless `filePath` names an existing file
 */
export async function ensureFileExists(filePath: string): Promise<void> {
  try {
    const info = await stat(filePath);
    if (info.isFile()) {
      return;
    }
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
  }
  throw new MediaNotFoundError(filePath);
}

function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
