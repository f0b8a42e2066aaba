/**
 * @fileoverview Provides a utility function to make fetch requests with a specified timeout.
 * @module src/utils/network/fetchWithTimeout
 */
import { PipelineError, PipelineErrorCode } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Options for the fetchWithTimeout utility.
 * Extends standard RequestInit and includes timeout.
 */
export interface FetchWithTimeoutOptions extends Omit<RequestInit, 'signal'> {
  timeout?: number;
}

export const DEFAULT_FETCH_TIMEOUT = 30000;

/**
 * Fetches a resource, aborting after `options.timeout` milliseconds.
 *
 * @returns The response; only ever a 2xx response.
 * @throws {PipelineError} `Timeout` when aborted, `NotFound` on 404,
 *   `NetworkError` on any other non-2xx status or transport failure.
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions,
  context: RequestContext,
): Promise<Response> {
  const { timeout, ...fetchOptions } = options;
  const timeoutMs = timeout ?? DEFAULT_FETCH_TIMEOUT;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const urlString = url.toString();
  const operationDescription = `fetch ${fetchOptions.method ?? 'GET'} ${urlString}`;

  logger.debug(
    `Attempting ${operationDescription} with ${timeoutMs}ms timeout.`,
    context,
  );

  let response: Response;
  try {
    response = await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      logger.error(`${operationDescription} timed out after ${timeoutMs}ms.`, {
        ...context,
        errorSource: 'FetchTimeout',
      });
      throw new PipelineError(
        PipelineErrorCode.Timeout,
        `${operationDescription} timed out.`,
        { requestId: context.requestId, url: urlString, timeoutMs },
      );
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(
      `Network error during ${operationDescription}: ${errorMessage}`,
      {
        ...context,
        originalErrorName: error instanceof Error ? error.name : 'UnknownError',
        errorSource: 'FetchNetworkError',
      },
    );
    throw new PipelineError(
      PipelineErrorCode.NetworkError,
      `Network error during ${operationDescription}: ${errorMessage}`,
      { requestId: context.requestId, url: urlString },
    );
  } finally {
    clearTimeout(timeoutId);
  }

  logger.debug(
    `Fetched ${urlString}. Status: ${response.status}`,
    context,
  );

  if (response.status === 404) {
    throw new PipelineError(
      PipelineErrorCode.NotFound,
      `Resource not found: ${urlString}`,
      { requestId: context.requestId, url: urlString, statusCode: 404 },
    );
  }

  if (!response.ok) {
    logger.error(
      `Fetch failed for ${urlString} with status ${response.status}.`,
      {
        ...context,
        errorSource: 'FetchHttpError',
        statusCode: response.status,
        statusText: response.statusText,
      },
    );
    throw new PipelineError(
      PipelineErrorCode.NetworkError,
      `HTTP error! Status: ${response.status} ${response.statusText}`,
      {
        requestId: context.requestId,
        url: urlString,
        statusCode: response.status,
        statusText: response.statusText,
      },
    );
  }

  return response;
}
