// ABOUTME: Drizzle-backed implementations of the post, chunk and chat exchange repositories.
// ABOUTME: Post updates are compare-and-set on the revision column; chunk replacement runs in one transaction.
import { and, asc, eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { ConflictError } from '../server/errors.js';
import type {
  ChatExchange,
  ChatExchangeRepository,
  Chunk,
  ChunkStore,
  NewChatExchange,
  Post,
  PostRepository,
} from '../server/ai/types.js';
import type { Database } from './client.js';
import { chatExchanges, postChunks, posts, type PostChunkRow, type PostRow } from './schema.js';

const uuidSchema = z.string().uuid();

// Non-UUID ids cannot exist in the table; answering early avoids a cast error from postgres
function isUuid(value: string): boolean {
  return uuidSchema.safeParse(value).success;
}

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    authorId: row.authorId,
    content: row.content,
    chatEnabled: row.chatEnabled,
    embeddingsReady: row.embeddingsReady,
    revision: row.revision,
  };
}

function toChunk(row: PostChunkRow): Chunk {
  return {
    postId: row.postId,
    chunkIndex: row.chunkIndex,
    content: row.content,
    embedding: row.embedding,
  };
}

export class DrizzlePostRepository implements PostRepository {
  constructor(private readonly db: Database) {}

  async getById(postId: string): Promise<Post | null> {
    if (!isUuid(postId)) return null;
    const rows = await this.db.select().from(posts).where(eq(posts.id, postId)).limit(1);
    return rows[0] ? toPost(rows[0]) : null;
  }

  async update(post: Post): Promise<Post> {
    const rows = await this.db
      .update(posts)
      .set({
        chatEnabled: post.chatEnabled,
        embeddingsReady: post.embeddingsReady,
        revision: sql`${posts.revision} + 1`,
        updatedAt: new Date(),
      })
      .where(and(eq(posts.id, post.id), eq(posts.revision, post.revision)))
      .returning();

    if (!rows[0]) {
      throw new ConflictError(post.id, post.revision);
    }
    return toPost(rows[0]);
  }

  async deleteEmbeddingsByPostId(postId: string): Promise<void> {
    if (!isUuid(postId)) return;
    await this.db.delete(postChunks).where(eq(postChunks.postId, postId));
  }
}

export class DrizzleChunkStore implements ChunkStore {
  constructor(private readonly db: Database) {}

  async getChunksByPost(postId: string): Promise<Chunk[]> {
    if (!isUuid(postId)) return [];
    const rows = await this.db
      .select()
      .from(postChunks)
      .where(eq(postChunks.postId, postId))
      .orderBy(asc(postChunks.chunkIndex));
    return rows.map(toChunk);
  }

  async replaceChunks(postId: string, chunks: Chunk[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(postChunks).where(eq(postChunks.postId, postId));
      if (chunks.length === 0) return;
      await tx.insert(postChunks).values(
        chunks.map((chunk) => ({
          postId,
          chunkIndex: chunk.chunkIndex,
          content: chunk.content,
          embedding: chunk.embedding,
        })),
      );
    });
  }

  async deleteChunks(postId: string): Promise<void> {
    if (!isUuid(postId)) return;
    await this.db.delete(postChunks).where(eq(postChunks.postId, postId));
  }
}

export class DrizzleChatExchangeRepository implements ChatExchangeRepository {
  constructor(private readonly db: Database) {}

  async create(exchange: NewChatExchange): Promise<ChatExchange> {
    const rows = await this.db
      .insert(chatExchanges)
      .values({
        postId: exchange.postId,
        userId: exchange.userId,
        prompt: exchange.prompt,
        response: exchange.response,
      })
      .returning();

    const row = rows[0];
    if (!row) {
      throw new Error('Failed to record chat exchange');
    }
    return row;
  }
}
