// ABOUTME: Retrieval step of post chat: embeds the question and ranks the post's chunks by cosine similarity.
// ABOUTME: The top-K chunk texts become the generation context; a fixed sentence stands in when nothing is stored.
import type { Embedder } from '../embeddings/index.js';
import type { Chunk, ChunkStore, ScoredChunk } from './types.js';
import { cosineSimilarity } from './vector-math.js';

export const NO_CONTEXT_FALLBACK =
  'There is no relevant information from the document. Answer the question as best as you can or inform the user you cannot answer.';

export const CONTEXT_SEPARATOR = '\n\n';

/**
 * Score every chunk against `queryVector` and keep the best `topK`.
 * Equal scores keep the order the chunks were given in.
 */
export function rankChunks(queryVector: readonly number[], chunks: readonly Chunk[], topK: number): ScoredChunk[] {
  return chunks
    .map((chunk, position) => ({
      position,
      scored: {
        content: chunk.content,
        chunkIndex: chunk.chunkIndex,
        score: cosineSimilarity(chunk.embedding, queryVector),
      },
    }))
    .sort((a, b) => b.scored.score - a.scored.score || a.position - b.position)
    .slice(0, Math.max(0, topK))
    .map(({ scored }) => scored);
}

export function buildContext(ranked: readonly ScoredChunk[]): string {
  const context = ranked.map((chunk) => chunk.content).join(CONTEXT_SEPARATOR);
  return context === '' ? NO_CONTEXT_FALLBACK : context;
}

export interface RetrievalOptions {
  topK: number;
}

export class RetrievalEngine {
  constructor(
    private readonly embedder: Embedder,
    private readonly chunks: ChunkStore,
    private readonly options: RetrievalOptions,
  ) {}

  async retrieve(postId: string, question: string): Promise<string> {
    const ranked = await this.search(postId, question);
    return buildContext(ranked);
  }

  async search(postId: string, question: string): Promise<ScoredChunk[]> {
    const queryVector = await this.embedder.embed(question);
    const stored = await this.chunks.getChunksByPost(postId);
    return rankChunks(queryVector, stored, this.options.topK);
  }
}
