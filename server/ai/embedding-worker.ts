// ABOUTME: Consumes embedding jobs: chunks a post, embeds every chunk and publishes the set atomically.
// ABOUTME: Only a successful publish marks the post's chat ready; embedding failures are left to queue retries.
import { ConflictError } from '../errors.js';
import type { Embedder } from '../embeddings/index.js';
import type { EmbeddingJobData } from '../queue/types.js';
import { splitPostText, type ChunkingOptions } from './chunking.js';
import type { PostLocks } from './post-lock.js';
import type { Chunk, ChunkStore, Logger, PostRepository } from './types.js';

export type EmbeddingJobResult = 'ready' | 'post_missing' | 'stale' | 'empty';

export interface EmbeddingWorkerDeps {
  posts: PostRepository;
  chunks: ChunkStore;
  embedder: Embedder;
  locks: PostLocks;
  chunking: ChunkingOptions;
  logger?: Logger;
}

export class EmbeddingWorker {
  private readonly logger: Logger;

  constructor(private readonly deps: EmbeddingWorkerDeps) {
    this.logger = deps.logger ?? console;
  }

  /**
   * Process one job. Throws when an embedding call fails so the queue retries;
   * every other outcome is terminal and reported through the result.
   */
  async handle(job: EmbeddingJobData): Promise<EmbeddingJobResult> {
    const { posts, chunks, embedder, locks } = this.deps;

    const post = await posts.getById(job.postId);
    if (!post) {
      this.logger.warn(`[worker] post ${job.postId} no longer exists, dropping job`);
      return 'post_missing';
    }
    if (post.revision !== job.revision) {
      this.logger.info(`[worker] post ${job.postId} moved past revision ${job.revision}, dropping job`);
      return 'stale';
    }

    const pieces = await splitPostText(post.content, this.deps.chunking);
    if (pieces.length === 0) {
      this.logger.warn(`[worker] post ${job.postId} has no text to embed, chat stays unavailable`);
      return 'empty';
    }

    // Embedding happens outside the lock; only the publish step is exclusive
    const prepared: Chunk[] = [];
    for (const [chunkIndex, content] of pieces.entries()) {
      const embedding = await embedder.embed(content);
      prepared.push({ postId: post.id, chunkIndex, content, embedding });
    }

    return locks.runExclusive<EmbeddingJobResult>(post.id, async () => {
      const current = await posts.getById(post.id);
      if (!current || current.revision !== job.revision) {
        this.logger.info(`[worker] post ${post.id} changed while embedding, discarding ${prepared.length} chunks`);
        return 'stale';
      }

      await chunks.replaceChunks(post.id, prepared);
      try {
        await posts.update({ ...current, chatEnabled: true, embeddingsReady: true });
      } catch (error) {
        if (!(error instanceof ConflictError)) {
          throw error;
        }
        // Another process changed the post; its state wins and our chunks must go
        await chunks.deleteChunks(post.id);
        this.logger.info(`[worker] ${error.message}, discarding ${prepared.length} chunks`);
        return 'stale';
      }

      this.logger.info(`[worker] post ${post.id} ready with ${prepared.length} chunks`);
      return 'ready';
    });
  }
}
