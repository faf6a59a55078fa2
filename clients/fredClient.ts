import { SeriesFetchError } from '../errors.js';
import { logger } from '../logger.js';
import { isRecord } from '../shared/guards.js';
import type {
  Observation,
  ReleaseDateSource,
  ReleaseDatesRequest,
  SeriesRequest,
  SeriesSource,
} from '../shared/types.js';
import { requestJson, type RetryPolicy } from './http.js';

export interface FredClientOptions {
  apiKey: string;
  baseUrl: string;
  retry: RetryPolicy;
}

/**
 * FRED marks missing observations with '.'
 */
function parseObservations(json: unknown, seriesId: string): Observation[] {
  if (!isRecord(json) || !Array.isArray(json.observations)) {
    throw new SeriesFetchError('Fatal', 'FRED', seriesId, `Unexpected FRED response for ${seriesId}`);
  }

  const observations: Observation[] = [];
  for (const row of json.observations) {
    if (!isRecord(row) || typeof row.date !== 'string' || typeof row.value !== 'string') continue;
    if (row.value === '.') continue;
    const value = Number(row.value);
    if (Number.isFinite(value)) {
      observations.push({ date: row.date, value });
    }
  }
  return observations;
}

function parseReleaseDates(json: unknown, label: string): string[] {
  if (!isRecord(json) || !Array.isArray(json.release_dates)) {
    throw new SeriesFetchError('Fatal', 'FRED', label, `Unexpected FRED response for ${label}`);
  }
  return json.release_dates.flatMap((row: unknown) =>
    isRecord(row) && typeof row.date === 'string' ? [row.date] : [],
  );
}

/**
 * Statistics API client over FRED `series/observations` and `release/dates`
 */
export class FredClient implements SeriesSource, ReleaseDateSource {
  constructor(private readonly options: FredClientOptions) {}

  async fetchSeries(seriesId: string, request: SeriesRequest = {}): Promise<Observation[]> {
    const url = new URL(`${this.options.baseUrl}/series/observations`);
    url.searchParams.set('series_id', seriesId);
    url.searchParams.set('api_key', this.options.apiKey);
    url.searchParams.set('file_type', 'json');
    if (request.start) url.searchParams.set('observation_start', request.start);
    if (request.end) url.searchParams.set('observation_end', request.end);
    if (request.frequency) url.searchParams.set('frequency', request.frequency);

    // Newest-first with a limit returns the most recent window
    if (request.limit !== undefined) {
      url.searchParams.set('sort_order', 'desc');
      url.searchParams.set('limit', String(request.limit));
    } else {
      url.searchParams.set('sort_order', 'asc');
    }

    const json = await requestJson(url, { source: 'FRED', seriesId }, this.options.retry);
    const observations = parseObservations(json, seriesId);
    if (request.limit !== undefined) observations.reverse();

    logger.debug({ seriesId, count: observations.length }, 'FRED series fetched');
    return observations;
  }

  /**
   * Scheduled publication dates of a release, including ones with no data yet
   */
  async fetchReleaseDates(releaseId: number, { from, limit = 10 }: ReleaseDatesRequest): Promise<string[]> {
    const url = new URL(`${this.options.baseUrl}/release/dates`);
    url.searchParams.set('release_id', String(releaseId));
    url.searchParams.set('api_key', this.options.apiKey);
    url.searchParams.set('file_type', 'json');
    url.searchParams.set('realtime_start', from);
    url.searchParams.set('include_release_dates_with_no_data', 'true');
    url.searchParams.set('sort_order', 'asc');
    url.searchParams.set('limit', String(limit));

    const label = `release ${releaseId}`;
    const json = await requestJson(url, { source: 'FRED', seriesId: label }, this.options.retry);
    const dates = parseReleaseDates(json, label);
    logger.debug({ releaseId, count: dates.length }, 'FRED release dates fetched');
    return dates;
  }
}
