import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from './errors.js';
import type { IndicatorService } from './indicatorService.js';
import { logger } from './logger.js';

export interface SchedulerOptions {
  service: IndicatorService;
  /** cron expression for cleanup runs */
  schedule: string;
  /** recompute every indicator after cleanup so the next request is a hit */
  warm?: boolean;
  /** consecutive failures before a fatal-level alert */
  alertAfter?: number;
}

export interface SchedulerHealth {
  lastSuccessfulRun: string | null;
  totalRuns: number;
  totalSuccesses: number;
  totalFailures: number;
  consecutiveFailures: number;
  successRate: string;
  isRunning: boolean;
}

export interface Scheduler {
  start(): void;
  stop(): void;
  /** one cycle now; skipped while another is in flight */
  runOnce(): Promise<void>;
  getHealthMetrics(): SchedulerHealth;
}

/**
 * Periodic cache maintenance: drop expired entries from both tiers, then
 * optionally warm every indicator. Overlapping cycles are skipped.
 */
export function createScheduler({ service, schedule, warm = true, alertAfter = 5 }: SchedulerOptions): Scheduler {
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron schedule: ${schedule}`);
  }

  let task: ScheduledTask | null = null;
  let lastSuccessfulRun: Date | null = null;
  let consecutiveFailures = 0;
  let totalRuns = 0;
  let totalSuccesses = 0;
  let totalFailures = 0;
  let isRunning = false;

  async function runOnce(): Promise<void> {
    if (isRunning) {
      logger.warn('Maintenance already running, skipping this cycle');
      return;
    }

    isRunning = true;
    totalRuns++;
    const startTime = Date.now();

    try {
      const report = await service.cleanupCache();
      logger.info(
        {
          expiredMemoryEntriesRemoved: report.expiredMemoryEntriesRemoved,
          expiredDiskEntriesRemoved: report.expiredDiskEntriesRemoved,
        },
        'Cache cleanup completed',
      );

      if (warm) {
        const { errors } = await service.getAllIndicators();
        if (errors.length > 0) {
          logger.warn({ errors }, 'Some indicators could not be warmed');
        }
      }

      lastSuccessfulRun = new Date();
      consecutiveFailures = 0;
      totalSuccesses++;
      logger.info({ duration: Date.now() - startTime }, 'Maintenance cycle completed');
    } catch (error) {
      consecutiveFailures++;
      totalFailures++;
      logger.error(
        { error: errorMessage(error), consecutiveFailures, duration: Date.now() - startTime },
        'Maintenance cycle failed',
      );

      if (consecutiveFailures >= alertAfter) {
        logger.fatal({ consecutiveFailures }, 'Too many consecutive maintenance failures');
      }
    } finally {
      isRunning = false;
    }
  }

  function getHealthMetrics(): SchedulerHealth {
    return {
      lastSuccessfulRun: lastSuccessfulRun?.toISOString() ?? null,
      totalRuns,
      totalSuccesses,
      totalFailures,
      consecutiveFailures,
      successRate: totalRuns > 0 ? ((totalSuccesses / totalRuns) * 100).toFixed(1) + '%' : '0%',
      isRunning,
    };
  }

  return {
    start() {
      if (task) return;
      task = cron.schedule(schedule, runOnce, { scheduled: false });
      task.start();
      logger.info({ schedule }, 'Scheduler started');
    },
    stop() {
      task?.stop();
      task = null;
      logger.info(getHealthMetrics(), 'Scheduler stopped');
    },
    runOnce,
    getHealthMetrics,
  };
}
