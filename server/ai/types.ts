// ABOUTME: Domain types and collaborator contracts for the post AI chat pipeline.
// ABOUTME: Drizzle implementations live in db/repositories.ts; in-memory ones in server/testing.

export interface Post {
  id: string;
  authorId: string;
  content: string;
  chatEnabled: boolean;
  embeddingsReady: boolean;
  /** Optimistic concurrency token, bumped by every successful update. */
  revision: number;
}

export interface Chunk {
  postId: string;
  chunkIndex: number;
  content: string;
  embedding: number[];
}

export interface ScoredChunk {
  content: string;
  chunkIndex: number;
  score: number;
}

export interface NewChatExchange {
  postId: string;
  userId: string;
  prompt: string;
  response: string;
}

export interface ChatExchange extends NewChatExchange {
  id: string;
  createdAt: Date;
}

export interface AuthUser {
  id: string;
}

/**
 * One streamed piece of a generated answer.
 */
export interface AnswerFragment {
  text: string;
}

export interface PostRepository {
  getById(postId: string): Promise<Post | null>;
  /**
   * Persist the flags of `post` if the stored revision still equals `post.revision`.
   * Resolves with the stored post (revision incremented); rejects with ConflictError otherwise.
   */
  update(post: Post): Promise<Post>;
  deleteEmbeddingsByPostId(postId: string): Promise<void>;
}

export interface ChunkStore {
  /** Chunks ordered by chunkIndex. */
  getChunksByPost(postId: string): Promise<Chunk[]>;
  /** Atomically swap the post's chunk set for `chunks`. */
  replaceChunks(postId: string, chunks: Chunk[]): Promise<void>;
  deleteChunks(postId: string): Promise<void>;
}

export interface ChatExchangeRepository {
  create(exchange: NewChatExchange): Promise<ChatExchange>;
}

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;
