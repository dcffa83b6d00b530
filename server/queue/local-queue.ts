// ABOUTME: In-process embedding job queue with bounded concurrency, retries and exponential backoff.
// ABOUTME: Used when REDIS_URL is unset and by tests; jobs do not survive a restart.
import type { Logger } from '../ai/types.js';
import {
  backoffDelay,
  embeddingJobId,
  type EmbeddingJobData,
  type EmbeddingJobHandler,
  type EmbeddingJobQueue,
  type EnqueueResult,
  type RetryPolicy,
} from './types.js';

interface QueuedJob {
  id: string;
  data: EmbeddingJobData;
  attemptsMade: number;
}

export interface LocalQueueOptions {
  concurrency: number;
  retry: RetryPolicy;
  logger?: Logger;
}

export class LocalEmbeddingQueue implements EmbeddingJobQueue {
  private running = 0;
  private closed = false;
  private handler: EmbeddingJobHandler | null = null;
  private readonly waiting: QueuedJob[] = [];
  // ids of jobs that are waiting, running or sleeping before a retry
  private readonly unfinished = new Set<string>();
  private readonly retryTimers = new Map<NodeJS.Timeout, QueuedJob>();
  private idleWaiters: Array<() => void> = [];
  private readonly logger: Logger;

  constructor(private readonly options: LocalQueueOptions) {
    this.logger = options.logger ?? console;
  }

  async enqueue(data: EmbeddingJobData): Promise<EnqueueResult> {
    if (this.closed) {
      throw new Error('Embedding queue is closed');
    }
    const jobId = embeddingJobId(data.postId, data.revision);
    if (this.unfinished.has(jobId)) {
      return { jobId, duplicate: true };
    }
    this.unfinished.add(jobId);
    this.waiting.push({ id: jobId, data, attemptsMade: 0 });
    this.drain();
    return { jobId, duplicate: false };
  }

  async isPending(jobId: string): Promise<boolean> {
    return this.unfinished.has(jobId);
  }

  process(handler: EmbeddingJobHandler): void {
    if (this.handler) {
      throw new Error('Embedding queue already has a handler');
    }
    this.handler = handler;
    this.drain();
  }

  /**
   * Resolves once nothing is waiting, running or scheduled for retry.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const [timer, job] of this.retryTimers) {
      clearTimeout(timer);
      this.unfinished.delete(job.id);
    }
    this.retryTimers.clear();
    for (const job of this.waiting.splice(0)) {
      this.unfinished.delete(job.id);
    }
    await this.onIdle();
  }

  getPendingCount(): number {
    return this.waiting.length + this.retryTimers.size;
  }

  private isIdle(): boolean {
    return this.running === 0 && this.waiting.length === 0 && this.retryTimers.size === 0;
  }

  private drain(): void {
    const handler = this.handler;
    if (!handler || this.closed) {
      this.notifyIdle();
      return;
    }

    while (this.running < this.options.concurrency) {
      const job = this.waiting.shift();
      if (!job) {
        break;
      }
      this.running += 1;
      job.attemptsMade += 1;
      handler(job.data)
        .then(
          () => {
            this.unfinished.delete(job.id);
          },
          (error: unknown) => this.handleFailure(job, error),
        )
        .finally(() => {
          this.running = Math.max(0, this.running - 1);
          this.drain();
        });
    }

    this.notifyIdle();
  }

  private handleFailure(job: QueuedJob, error: unknown): void {
    const { attempts } = this.options.retry;
    const message = error instanceof Error ? error.message : String(error);

    if (job.attemptsMade >= attempts || this.closed) {
      this.unfinished.delete(job.id);
      this.logger.error(`[queue] ${job.id} dropped after ${job.attemptsMade} attempt(s): ${message}`);
      return;
    }

    const delay = backoffDelay(this.options.retry, job.attemptsMade);
    this.logger.warn(
      `[queue] ${job.id} failed (attempt ${job.attemptsMade}/${attempts}), retrying in ${delay}ms: ${message}`,
    );
    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      this.waiting.push(job);
      this.drain();
    }, delay);
    this.retryTimers.set(timer, job);
  }

  private notifyIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
