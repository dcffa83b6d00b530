// ABOUTME: Drizzle ORM schema for posts, their embedded chunks (pgvector) and recorded chat exchanges.
// ABOUTME: Chunk rows cascade with their post; the vector width matches EMBEDDING_DIMENSIONS.
import { pgTable, bigserial, uuid, integer, text, boolean, vector, timestamp, index } from 'drizzle-orm/pg-core';

export const EMBEDDING_COLUMN_DIMENSIONS = 1536;

export const posts = pgTable('posts', {
  id: uuid('id').defaultRandom().primaryKey(),
  authorId: uuid('author_id').notNull(),
  content: text('content').notNull().default(''),
  chatEnabled: boolean('chat_enabled').notNull().default(false),
  embeddingsReady: boolean('embeddings_ready').notNull().default(false),
  revision: integer('revision').notNull().default(0),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const postChunks = pgTable('post_chunks', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  postId: uuid('post_id').notNull().references(() => posts.id, { onDelete: 'cascade' }),
  chunkIndex: integer('chunk_index').notNull(),
  content: text('content').notNull(),
  embedding: vector('embedding', { dimensions: EMBEDDING_COLUMN_DIMENSIONS }).notNull(),
}, (table) => ({
  postOrder: index('post_chunks_post_id_chunk_index_idx').on(table.postId, table.chunkIndex),
}));

export const chatExchanges = pgTable('chat_exchanges', {
  id: uuid('id').defaultRandom().primaryKey(),
  postId: uuid('post_id').notNull().references(() => posts.id, { onDelete: 'cascade' }),
  userId: uuid('user_id').notNull(),
  prompt: text('prompt').notNull(),
  response: text('response').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

export type PostRow = typeof posts.$inferSelect;
export type PostChunkRow = typeof postChunks.$inferSelect;
export type NewPostChunkRow = typeof postChunks.$inferInsert;
export type ChatExchangeRow = typeof chatExchanges.$inferSelect;
