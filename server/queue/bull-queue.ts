// ABOUTME: Redis-backed embedding job queue built on BullMQ.
// ABOUTME: BullMQ owns retries (exponential backoff) and bounds concurrency per worker process.
import { Queue, Worker, type Job, type RedisOptions } from 'bullmq';
import type { Logger } from '../ai/types.js';
import {
  EMBEDDING_QUEUE_NAME,
  embeddingJobId,
  type EmbeddingJobData,
  type EmbeddingJobHandler,
  type EmbeddingJobQueue,
  type EnqueueResult,
  type RetryPolicy,
} from './types.js';

export interface BullQueueOptions {
  redisUrl: string;
  concurrency: number;
  retry: RetryPolicy;
  logger?: Logger;
}

export function buildRedisConnection(url: string): RedisOptions {
  const parsed = new URL(url);
  const opts: RedisOptions = {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
  };
  if (parsed.username) {
    opts.username = decodeURIComponent(parsed.username);
  }
  if (parsed.password) {
    opts.password = decodeURIComponent(parsed.password);
  }
  if (parsed.pathname.length > 1) {
    const db = Number(parsed.pathname.replace(/^\/+/, ''));
    if (!Number.isNaN(db)) {
      opts.db = db;
    }
  }
  if (parsed.protocol === 'rediss:') {
    opts.tls = {};
  }
  return opts;
}

export class BullEmbeddingQueue implements EmbeddingJobQueue {
  private readonly connection: RedisOptions;
  private readonly queue: Queue<EmbeddingJobData>;
  private worker: Worker<EmbeddingJobData> | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: BullQueueOptions) {
    this.logger = options.logger ?? console;
    this.connection = buildRedisConnection(options.redisUrl);
    this.queue = new Queue<EmbeddingJobData>(EMBEDDING_QUEUE_NAME, { connection: this.connection });
  }

  async enqueue(data: EmbeddingJobData): Promise<EnqueueResult> {
    const jobId = embeddingJobId(data.postId, data.revision);
    if (await this.isPending(jobId)) {
      return { jobId, duplicate: true };
    }

    await this.queue.add(EMBEDDING_QUEUE_NAME, data, {
      jobId,
      attempts: this.options.retry.attempts,
      backoff: { type: 'exponential', delay: this.options.retry.backoffMs },
      removeOnComplete: true,
      removeOnFail: true,
    });
    return { jobId, duplicate: false };
  }

  async isPending(jobId: string): Promise<boolean> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      return false;
    }
    const state = await job.getState();
    return state !== 'completed' && state !== 'failed' && state !== 'unknown';
  }

  process(handler: EmbeddingJobHandler): void {
    if (this.worker) {
      throw new Error('Embedding queue already has a handler');
    }

    const worker = new Worker<EmbeddingJobData>(
      EMBEDDING_QUEUE_NAME,
      async (job: Job<EmbeddingJobData>) => handler(job.data),
      { connection: this.connection, concurrency: this.options.concurrency },
    );

    worker.on('failed', (job: Job<EmbeddingJobData> | undefined, error: Error) => {
      if (!job) {
        this.logger.error('[queue] job failed:', error);
        return;
      }
      const attempts = job.opts.attempts ?? 1;
      if (job.attemptsMade >= attempts) {
        this.logger.error(`[queue] ${job.id} dropped after ${job.attemptsMade} attempt(s): ${error.message}`);
      } else {
        this.logger.warn(`[queue] ${job.id} failed (attempt ${job.attemptsMade}/${attempts}): ${error.message}`);
      }
    });
    worker.on('error', (error: Error) => {
      this.logger.error('[queue] worker error', error);
    });

    this.worker = worker;
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
