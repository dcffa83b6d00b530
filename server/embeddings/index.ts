// ABOUTME: Embedding service entry point: the Embedder contract and its construction from config.
// ABOUTME: The worker embeds post chunks and the retrieval engine embeds questions through it.
import type { AppConfig } from '../config.js';
import type { Logger } from '../ai/types.js';
import { OpenAIEmbeddingClient } from './openai-embeddings.js';

/**
 * Turns text into a fixed-dimension vector
 */
export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

/**
 * Build the embedder described by `config` and log where it points
 */
export function createEmbedder(config: AppConfig['embedding'], logger: Logger = console): Embedder {
  const target = config.baseUrl ?? 'https://api.openai.com/v1';
  logger.info(`[embeddings] ${config.model} (${config.dimensions} dims) via ${target}`);
  return new OpenAIEmbeddingClient(config);
}
