import { SeriesFetchError, errorMessage, isRetryable, type DataSource } from '../errors.js';
import { logger } from '../logger.js';

export interface RetryPolicy {
  maxRetries: number;
  /** delay before retry n (0-based) is `baseDelayMs * 2^(n+1)` */
  baseDelayMs: number;
  timeoutMs: number;
}

export interface RequestContext {
  source: DataSource;
  seriesId: string;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Maps an HTTP failure onto the fetch error taxonomy.
 * FRED answers an unknown series with a 400 whose message says so.
 */
export function classifyResponse(status: number, body: string, context: RequestContext): SeriesFetchError {
  const detail = body.slice(0, 200);
  const message = `${context.source} request for ${context.seriesId} failed: ${status} ${detail}`.trim();

  if (status === 404 || (status === 400 && /does not exist/i.test(body))) {
    return new SeriesFetchError('NotFound', context.source, context.seriesId, message, status);
  }
  if (status === 429) {
    return new SeriesFetchError('RateLimited', context.source, context.seriesId, message, status);
  }
  if (status >= 500) {
    return new SeriesFetchError('Transient', context.source, context.seriesId, message, status);
  }
  return new SeriesFetchError('Fatal', context.source, context.seriesId, message, status);
}

async function requestOnce(url: URL, context: RequestContext, timeoutMs: number): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new SeriesFetchError(
      'Transient',
      context.source,
      context.seriesId,
      `${context.source} request for ${context.seriesId} failed: ${errorMessage(error)}`,
    );
  }

  if (!response.ok) {
    throw classifyResponse(response.status, await response.text(), context);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new SeriesFetchError(
      'Transient',
      context.source,
      context.seriesId,
      `${context.source} returned malformed JSON for ${context.seriesId}: ${errorMessage(error)}`,
      response.status,
    );
  }
}

/**
 * GETs a JSON document, retrying rate limits and transient failures with
 * exponential backoff. Non-retryable failures surface on the first attempt.
 */
export async function requestJson(url: URL, context: RequestContext, policy: RetryPolicy): Promise<unknown> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await requestOnce(url, context, policy.timeoutMs);
    } catch (error) {
      if (!isRetryable(error) || attempt >= policy.maxRetries) {
        logger.error(
          { ...context, attempts: attempt + 1, error: errorMessage(error) },
          'Upstream request failed',
        );
        throw error;
      }
      // Exponential backoff: 2s, 4s, 8s with the default base
      const delay = Math.pow(2, attempt + 1) * policy.baseDelayMs;
      logger.warn(
        { ...context, attempt: attempt + 1, delay, error: errorMessage(error) },
        'Upstream request failed, retrying',
      );
      await sleep(delay);
    }
  }
}
