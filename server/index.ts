// ABOUTME: Main Hono server entry point: wires config, storage, queue, embedding worker and AI routes.
// ABOUTME: Serves the API on PORT and drains the embedding queue in the same process.
import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { createDatabase } from '../db/client.js';
import { DrizzleChatExchangeRepository, DrizzleChunkStore, DrizzlePostRepository } from '../db/repositories.js';
import { EMBEDDING_COLUMN_DIMENSIONS } from '../db/schema.js';
import { EmbeddingWorker } from './ai/embedding-worker.js';
import { GenerationClient } from './ai/generation.js';
import { PostLocks } from './ai/post-lock.js';
import { RetrievalEngine } from './ai/retrieval.js';
import { AIService } from './ai/service.js';
import { loadConfig } from './config.js';
import { createEmbedder } from './embeddings/index.js';
import { createEmbeddingQueue } from './queue/index.js';
import { createAIRoutes } from './routes.js';

const config = loadConfig();
if (config.embedding.dimensions !== EMBEDDING_COLUMN_DIMENSIONS) {
  throw new Error(
    `EMBEDDING_DIMENSIONS=${config.embedding.dimensions} does not match the post_chunks.embedding column (${EMBEDDING_COLUMN_DIMENSIONS})`,
  );
}

const { db, sql } = createDatabase(config.databaseUrl);
const posts = new DrizzlePostRepository(db);
const chunks = new DrizzleChunkStore(db);
const exchanges = new DrizzleChatExchangeRepository(db);

const locks = new PostLocks();
const embedder = createEmbedder(config.embedding);
const queue = createEmbeddingQueue(config);

const worker = new EmbeddingWorker({ posts, chunks, embedder, locks, chunking: config.chunking });
queue.process((job) => worker.handle(job));

const service = new AIService({
  posts,
  exchanges,
  queue,
  locks,
  retrieval: new RetrievalEngine(embedder, chunks, config.retrieval),
  generation: new GenerationClient(config.generation),
  options: { shortCircuitSmallTalk: config.chat.shortCircuitSmallTalk },
});

const app = new Hono();

app.use('*', logger());
app.use('*', cors(config.allowedOrigins.length > 0 ? { origin: config.allowedOrigins, credentials: true } : undefined));

app.get('/health', (c) => {
  return c.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.route('/api', createAIRoutes(service));

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

console.log(`Server running on http://localhost:${config.port} (${config.appEnv})`);

async function shutdown(signal: string) {
  console.log(`${signal} received, shutting down...`);
  server.close();
  try {
    await queue.close();
    await sql.end();
  } catch (error) {
    console.error('Shutdown failed:', error);
    process.exitCode = 1;
  }
}

process.once('SIGTERM', (signal) => void shutdown(signal));
process.once('SIGINT', (signal) => void shutdown(signal));
