import { SeriesFetchError } from '../errors.js';
import { logger } from '../logger.js';
import { isRecord } from '../shared/guards.js';
import type { Observation, QuoteRequest, QuoteSource } from '../shared/types.js';
import { requestJson, type RetryPolicy } from './http.js';

export interface YahooClientOptions {
  baseUrl: string;
  retry: RetryPolicy;
}

const toEpochSeconds = (date: string): number => Math.floor(Date.parse(`${date}T00:00:00Z`) / 1000);

const first = (value: unknown): unknown => (Array.isArray(value) ? value[0] : undefined);

/**
 * Pulls `(timestamp, close)` pairs out of a chart API document; null closes
 * (holidays, halted sessions) are skipped.
 */
function parseChart(json: unknown, symbol: string): Observation[] {
  const malformed = () => new SeriesFetchError('Fatal', 'Yahoo', symbol, `Unexpected Yahoo response for ${symbol}`);

  if (!isRecord(json) || !isRecord(json.chart)) throw malformed();
  const { result, error } = json.chart;

  if (isRecord(error)) {
    const description = typeof error.description === 'string' ? error.description : 'unknown error';
    const kind = error.code === 'Not Found' ? 'NotFound' : 'Fatal';
    throw new SeriesFetchError(kind, 'Yahoo', symbol, `Yahoo error for ${symbol}: ${description}`);
  }

  const chart = first(result);
  if (!isRecord(chart)) {
    throw new SeriesFetchError('NotFound', 'Yahoo', symbol, `No data found for ${symbol}`);
  }

  const timestamps = chart.timestamp;
  const quote = isRecord(chart.indicators) ? first(chart.indicators.quote) : undefined;
  const closes = isRecord(quote) ? quote.close : undefined;
  if (timestamps === undefined) return [];
  if (!Array.isArray(timestamps) || !Array.isArray(closes)) throw malformed();

  const observations: Observation[] = [];
  timestamps.forEach((timestamp: unknown, i) => {
    const close: unknown = closes[i];
    if (typeof timestamp !== 'number' || typeof close !== 'number' || !Number.isFinite(close)) return;
    observations.push({ date: new Date(timestamp * 1000).toISOString().slice(0, 10), value: close });
  });
  return observations;
}

/**
 * Financial quotes client over the Yahoo Finance chart endpoint
 */
export class YahooClient implements QuoteSource {
  constructor(private readonly options: YahooClientOptions) {}

  async fetchQuotes(symbol: string, request: QuoteRequest): Promise<Observation[]> {
    const url = new URL(`${this.options.baseUrl}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('period1', String(toEpochSeconds(request.start)));
    url.searchParams.set('period2', String(toEpochSeconds(request.end)));
    url.searchParams.set('interval', request.interval ?? '1d');
    url.searchParams.set('events', 'history');

    const json = await requestJson(url, { source: 'Yahoo', seriesId: symbol }, this.options.retry);
    const observations = parseChart(json, symbol);

    logger.debug({ symbol, count: observations.length }, 'Yahoo quotes fetched');
    return observations;
  }
}
