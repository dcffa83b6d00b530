// ABOUTME: Splits post text into bounded-size chunks for embedding.
// ABOUTME: Prefers paragraph, then line, then sentence boundaries via LangChain's recursive splitter.
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

const SEPARATORS = ['\n\n', '\n', '. ', '? ', '! ', '; ', ' ', ''];

/**
 * Split `text` into trimmed, non-empty chunks of at most `chunkSize` characters.
 * Whitespace-only input yields no chunks.
 */
export async function splitPostText(text: string, options: ChunkingOptions): Promise<string[]> {
  const content = text.trim();
  if (content.length === 0) {
    return [];
  }

  // Short posts become a single chunk
  if (content.length <= options.chunkSize) {
    return [content];
  }

  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
    separators: SEPARATORS,
  });

  const pieces = await splitter.splitText(content);
  return pieces
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);
}
