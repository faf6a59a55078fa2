import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { buildDashboard } from './buildDashboard.js';
import type { Config } from './config.js';
import { errorMessage } from './errors.js';
import type { IndicatorParams, IndicatorService } from './indicatorService.js';
import type { DashboardMetrics } from './lib/metrics.js';
import type { Logger } from './logger.js';
import type { Frequency } from './shared/types.js';

export interface ServerDeps {
  service: IndicatorService;
  config: Config;
  logger: Logger;
  metrics: DashboardMetrics;
}

interface IndicatorQuery {
  periods?: number;
  frequency?: Frequency;
}

const indicatorQuerySchema = {
  type: 'object',
  properties: {
    periods: { type: 'integer', minimum: 1, maximum: 5000 },
    frequency: { type: 'string', enum: ['d', 'w', 'm', 'q'] },
  },
  additionalProperties: false,
} as const;

const keyParamsSchema = {
  type: 'object',
  properties: { key: { type: 'string', minLength: 1 } },
  required: ['key'],
} as const;

const paramsOf = (query: IndicatorQuery): IndicatorParams | undefined =>
  query.periods === undefined && query.frequency === undefined
    ? undefined
    : { periods: query.periods, frequency: query.frequency };

/**
 * Builds the dashboard API. Nothing listens until the caller says so, which
 * lets tests drive it with `inject`.
 */
export async function buildServer({ service, config, logger, metrics }: ServerDeps) {
  const server = Fastify({
    logger,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    trustProxy: true,
  });

  // CORS configuration - restrict to configured origins
  const { corsOrigins } = config.server;
  await server.register(cors, {
    origin: typeof corsOrigins === 'boolean' ? corsOrigins : [...corsOrigins],
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });

  await server.register(rateLimit, {
    max: config.server.rateLimitMax,
    timeWindow: config.server.rateLimitWindow,
    cache: 10000,
    allowList: ['127.0.0.1', 'localhost'],
  });

  server.addHook('onResponse', async (request, reply) => {
    metrics.httpRequestDuration.observe(
      { route: request.routeOptions.url ?? 'unmatched', status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
  });

  server.get('/healthz', async (request, reply) => {
    return reply.code(200).send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      indicators: service.registry.size,
    });
  });

  /**
   * Prometheus scrape endpoint
   */
  server.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  /**
   * Every indicator rendered as a card, plus the cross-indicator alerts
   */
  server.get('/v1/dashboard', async (request, reply) => {
    try {
      const result = await service.getAllIndicators();
      return buildDashboard(result, service.registry);
    } catch (error) {
      logger.error({ error: errorMessage(error), reqId: request.id }, 'Failed to build dashboard');
      return reply.code(500).send({
        error: 'Internal server error',
        message: 'Failed to build dashboard',
      });
    }
  });

  server.get('/v1/indicators', async () => {
    return {
      indicators: service.registry.list().map((indicator) => ({
        key: indicator.key,
        displayName: indicator.displayName,
        emoji: indicator.emoji,
        kind: indicator.kind,
        chart: indicator.chart,
        fredSeries: indicator.fredSeries,
        yahooSymbols: indicator.yahooSymbols,
        periods: indicator.periods,
        frequency: indicator.frequency,
      })),
    };
  });

  /**
   * One indicator. Degraded results are still a 200; the body says what is
   * missing.
   */
  server.get<{ Params: { key: string }; Querystring: IndicatorQuery }>(
    '/v1/indicators/:key',
    { schema: { params: keyParamsSchema, querystring: indicatorQuerySchema } },
    async (request, reply) => {
      const { key } = request.params;
      if (!service.registry.has(key)) {
        return reply.code(404).send({ error: 'Not found', message: `Indicator '${key}' not found in registry` });
      }

      const outcome = await service.getIndicator(key, paramsOf(request.query));
      reply.header('X-Cache', outcome.cached ? 'HIT' : 'MISS');
      if (outcome.status === 'failed') {
        logger.warn({ indicator: key, error: outcome.error, reqId: request.id }, 'Indicator unavailable');
        return reply.code(502).send(outcome);
      }
      return outcome;
    },
  );

  server.get('/v1/releases', async () => {
    return { releases: await service.getReleaseCalendar() };
  });

  server.get('/v1/cache/stats', async (request, reply) => {
    try {
      return await service.getCacheStats();
    } catch (error) {
      logger.error({ error: errorMessage(error), reqId: request.id }, 'Failed to read cache stats');
      return reply.code(500).send({
        error: 'Internal server error',
        message: 'Failed to read cache stats',
      });
    }
  });

  /**
   * Without query parameters, drops every cached variant of the indicator
   */
  server.delete<{ Params: { key: string }; Querystring: IndicatorQuery }>(
    '/v1/cache/:key',
    { schema: { params: keyParamsSchema, querystring: indicatorQuerySchema } },
    async (request, reply) => {
      const { key } = request.params;
      if (!service.registry.has(key)) {
        return reply.code(404).send({ error: 'Not found', message: `Indicator '${key}' not found in registry` });
      }
      const removed = await service.invalidate(key, paramsOf(request.query));
      logger.info({ indicator: key, removed, reqId: request.id }, 'Cache invalidated');
      return { key, removed };
    },
  );

  server.delete('/v1/cache', async (request) => {
    await service.clearCache();
    logger.info({ reqId: request.id }, 'Cache cleared via API');
    return { cleared: true };
  });

  server.post('/v1/cache/cleanup', async () => {
    return service.cleanupCache();
  });

  return server;
}

export type DashboardServer = Awaited<ReturnType<typeof buildServer>>;
