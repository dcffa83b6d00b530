// ABOUTME: Contract shared by the Redis-backed and in-process embedding job queues.
// ABOUTME: Jobs are keyed by post and revision so a repeated enable request is deduplicated.

export interface EmbeddingJobData {
  postId: string;
  userId: string;
  /** Post revision the job was requested against; a newer revision makes the job stale. */
  revision: number;
}

export interface EnqueueResult {
  jobId: string;
  /** True when an unfinished job with the same id already existed and nothing was added. */
  duplicate: boolean;
}

export type EmbeddingJobHandler = (job: EmbeddingJobData) => Promise<unknown>;

export interface RetryPolicy {
  /** Total attempts including the first run. */
  attempts: number;
  /** Base delay; attempt n waits backoffMs * 2^(n-1) before running again. */
  backoffMs: number;
}

export interface EmbeddingJobQueue {
  enqueue(job: EmbeddingJobData): Promise<EnqueueResult>;
  isPending(jobId: string): Promise<boolean>;
  /** Start draining the queue with `handler`. Call once. */
  process(handler: EmbeddingJobHandler): void;
  close(): Promise<void>;
}

export const EMBEDDING_QUEUE_NAME = 'post-embedding';

export function embeddingJobId(postId: string, revision: number): string {
  return `${EMBEDDING_QUEUE_NAME}-${postId}-r${revision}`;
}

export function backoffDelay(policy: RetryPolicy, attemptsMade: number): number {
  return policy.backoffMs * Math.pow(2, Math.max(0, attemptsMade - 1));
}
