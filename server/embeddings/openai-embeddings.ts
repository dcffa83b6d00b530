// ABOUTME: Embedding client for any OpenAI-compatible embeddings endpoint (OpenAI, Ollama).
// ABOUTME: Validates vector dimensions and reports failures as UpstreamError without retrying.
import OpenAI from 'openai';
import { UpstreamError, ValidationError } from '../errors.js';
import type { Embedder } from './index.js';

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  baseUrl?: string;
  model: string;
  dimensions: number;
}

/**
 * Minimal slice of the OpenAI SDK this client calls; lets tests pass a stand-in.
 */
export interface EmbeddingsApi {
  create(body: { model: string; input: string }): Promise<{ data: Array<{ embedding: number[] }> }>;
}

export class OpenAIEmbeddingClient implements Embedder {
  private readonly embeddings: EmbeddingsApi;

  constructor(private readonly options: OpenAIEmbeddingOptions, embeddings?: EmbeddingsApi) {
    // Retries belong to the embedding job queue, so the SDK makes a single attempt
    this.embeddings =
      embeddings ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        maxRetries: 0,
      }).embeddings;
  }

  get dimensions(): number {
    return this.options.dimensions;
  }

  /**
   * Generate an embedding vector for `text`
   * @throws ValidationError for empty text, UpstreamError when the call fails or the vector is malformed
   */
  async embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new ValidationError('Text cannot be empty', 'text');
    }

    let response: Awaited<ReturnType<EmbeddingsApi['create']>>;
    try {
      response = await this.embeddings.create({
        model: this.options.model,
        input: text,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Embedding request failed: ${message}`, {
        status: error instanceof OpenAI.APIError ? error.status : undefined,
        cause: error,
      });
    }

    const embedding = response.data[0]?.embedding;
    if (!Array.isArray(embedding)) {
      throw new UpstreamError('Embedding response contained no vector');
    }

    // Verify dimensions
    if (embedding.length !== this.options.dimensions) {
      throw new UpstreamError(
        `Expected ${this.options.dimensions} dimensions, got ${embedding.length}`,
      );
    }
    if (!embedding.every((value) => typeof value === 'number' && Number.isFinite(value))) {
      throw new UpstreamError('Embedding response contained non-numeric values');
    }

    return embedding;
  }
}
