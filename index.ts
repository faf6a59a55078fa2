/**
 * Process entry point: wires configuration, clients, cache and service into
 * the API server and the maintenance scheduler.
 */
import { CacheManager } from './cache/cacheManager.js';
import { FredClient } from './clients/fredClient.js';
import type { RetryPolicy } from './clients/http.js';
import { YahooClient } from './clients/yahooClient.js';
import { loadConfig } from './config.js';
import { IndicatorService } from './indicatorService.js';
import { createMetrics } from './lib/metrics.js';
import { logger } from './logger.js';
import { createScheduler } from './scheduler.js';
import { buildServer } from './server.js';
import { createIndicatorRegistry } from './shared/indicatorRegistry.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const retry: RetryPolicy = {
    maxRetries: config.api.maxRetries,
    baseDelayMs: config.api.retryBaseDelayMs,
    timeoutMs: config.api.requestTimeoutMs,
  };
  const metrics = createMetrics();
  const cache = new CacheManager(config.cache, { onLookup: metrics.recordCacheLookup });
  const fred = new FredClient({ apiKey: config.api.fredApiKey, baseUrl: config.api.fredBaseUrl, retry });
  const service = new IndicatorService({
    config,
    registry: createIndicatorRegistry(config),
    cache,
    series: fred,
    quotes: new YahooClient({ baseUrl: config.api.yahooBaseUrl, retry }),
    releases: fred,
    metrics,
  });

  const server = await buildServer({ service, config, logger, metrics });
  const scheduler = createScheduler({ service, schedule: config.cache.cleanupCron });

  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info({ port: config.server.port, host: config.server.host }, 'API server running');
  scheduler.start();

  let shuttingDown = false;
  const shutdown = async (reason: string, code: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, 'Shutting down gracefully');
    try {
      scheduler.stop();
      await server.close();
      logger.info('Server shutdown complete');
      process.exit(code);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT', 0));
  process.on('SIGTERM', () => void shutdown('SIGTERM', 0));
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    void shutdown('uncaughtException', 1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection', 1);
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start');
  process.exit(1);
});
