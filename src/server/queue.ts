/**
 * BullMQ Queue Configuration
 *
 * One job per sorting run:
 * - jobId "run-{runId}" so a resubmitted run id is not processed twice
 * - 3 attempts with exponential backoff (10s, 20s, 40s)
 * - Completed jobs kept 7 days so GET /runs/:runId can report them
 * - Failed jobs kept for inspection
 *
 * Lazy singleton: no Redis connection is opened at import time.
 */

import { Queue } from 'bullmq';
import { appConfig } from '../config.js';
import type { RunJobData, RunResult } from '../pipeline/types.js';

export const RUN_QUEUE_NAME = 'tax-doc-runs';

/** Redis connection config shape for BullMQ */
export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  maxRetriesPerRequest: null;
}

/** Supports redis:// and rediss:// URLs */
export function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
}

/**
 * REDIS_URL wins over REDIS_HOST/PORT/PASSWORD.
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

export function runJobId(runId: string): string {
  return `run-${runId}`;
}

let _queue: Queue<RunJobData, RunResult> | null = null;

export function getRunQueue(): Queue<RunJobData, RunResult> {
  if (!_queue) {
    _queue = new Queue<RunJobData, RunResult>(RUN_QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 10_000,
        },
        removeOnComplete: { age: 7 * 86400 },
        removeOnFail: false,
      },
    });
  }
  return _queue;
}

export async function closeRunQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
