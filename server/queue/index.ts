// ABOUTME: Chooses the embedding job queue backend: BullMQ when REDIS_URL is set, in-process otherwise.
import type { AppConfig } from '../config.js';
import type { Logger } from '../ai/types.js';
import { BullEmbeddingQueue } from './bull-queue.js';
import { LocalEmbeddingQueue } from './local-queue.js';
import type { EmbeddingJobQueue } from './types.js';

export function createEmbeddingQueue(config: AppConfig, logger: Logger = console): EmbeddingJobQueue {
  const retry = { attempts: config.queue.attempts, backoffMs: config.queue.backoffMs };
  if (config.redisUrl) {
    logger.info(`[queue] redis backend, concurrency ${config.queue.concurrency}`);
    return new BullEmbeddingQueue({
      redisUrl: config.redisUrl,
      concurrency: config.queue.concurrency,
      retry,
      logger,
    });
  }
  logger.warn('[queue] REDIS_URL not set, embedding jobs run in process and are lost on restart');
  return new LocalEmbeddingQueue({ concurrency: config.queue.concurrency, retry, logger });
}
