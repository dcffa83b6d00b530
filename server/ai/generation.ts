// ABOUTME: Streaming client for the generation model; reads its SSE-style line protocol.
// ABOUTME: Yields answer fragments in arrival order and stops promptly when the caller aborts.
import { z } from 'zod';
import { UpstreamError } from '../errors.js';
import type { AnswerFragment, Logger } from './types.js';

const DATA_PREFIX = 'data: ';
const DONE_SENTINEL = '[DONE]';

const eventPayloadSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

export interface GenerationClientOptions {
  host: string;
  path: string;
  model: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

export interface AnswerGenerator {
  streamAnswer(context: string, question: string, signal?: AbortSignal): AsyncGenerator<AnswerFragment>;
}

/**
 * Parse one line of the event stream. Returns null for anything that carries no text:
 * lines without the data marker, blank payloads, the end sentinel and malformed JSON.
 */
export function parseEventLine(line: string): AnswerFragment | null {
  const trimmedLine = line.endsWith('\r') ? line.slice(0, -1) : line;
  if (!trimmedLine.startsWith(DATA_PREFIX)) return null;

  const raw = trimmedLine.slice(DATA_PREFIX.length).trim();
  if (raw.length === 0 || raw === DONE_SENTINEL) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = eventPayloadSchema.safeParse(json);
  if (!parsed.success || parsed.data.message.content.length === 0) return null;
  return { text: parsed.data.message.content };
}

export function encodeFragment(fragment: AnswerFragment): string {
  return JSON.stringify({ text: fragment.text });
}

export class GenerationClient implements AnswerGenerator {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: GenerationClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? console;
  }

  /**
   * Ask the model to answer `question` with `context` as the system instruction.
   *
   * Connection failures, non-2xx statuses and read errors before the first fragment throw
   * UpstreamError. A read error after a fragment has been delivered ends the stream quietly.
   */
  async *streamAnswer(
    context: string,
    question: string,
    signal?: AbortSignal,
  ): AsyncGenerator<AnswerFragment> {
    const url = `${this.options.host}${this.options.path}`;
    const body = JSON.stringify({
      model: this.options.model,
      stream: true,
      messages: [
        { role: 'system', content: context },
        { role: 'user', content: question },
      ],
    });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
        body,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) return;
      throw new UpstreamError('Generation request failed', { cause: error });
    }

    if (!response.ok || !response.body) {
      await response.body?.cancel().catch((error: unknown) => {
        this.logger.warn('[generation] failed to discard error body:', error);
      });
      throw new UpstreamError(`Generation failed: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffered = '';
    let delivered = 0;

    try {
      while (true) {
        if (signal?.aborted) return;

        let chunk: Awaited<ReturnType<typeof reader.read>>;
        try {
          chunk = await reader.read();
        } catch (error) {
          if (signal?.aborted) return;
          if (delivered === 0) {
            throw new UpstreamError('Generation stream failed before any answer text', { cause: error });
          }
          this.logger.warn('[generation] stream interrupted, keeping partial answer:', error);
          return;
        }

        if (chunk.done) {
          buffered += decoder.decode();
          break;
        }

        buffered += decoder.decode(chunk.value, { stream: true });
        let newline = buffered.indexOf('\n');
        while (newline !== -1) {
          const fragment = parseEventLine(buffered.slice(0, newline));
          buffered = buffered.slice(newline + 1);
          if (fragment) {
            delivered++;
            yield fragment;
            if (signal?.aborted) return;
          }
          newline = buffered.indexOf('\n');
        }
      }

      const last = parseEventLine(buffered);
      if (last) {
        yield last;
      }
    } finally {
      // Closes the connection when the consumer stops early or the signal fired
      await reader.cancel().catch((error: unknown) => {
        this.logger.warn('[generation] failed to close stream:', error);
      });
    }
  }
}
