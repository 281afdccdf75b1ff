import { encode } from "gpt-tokenizer";

export interface ChunkOptions {
  /** Upper bound on window length, in characters. */
  maxChars: number;
  /** Characters shared between consecutive windows. */
  overlap: number;
}

export interface TextChunk {
  index: number;
  content: string;
  tokenCount: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}

/**
 * Split text into overlapping windows of at most `maxChars` characters.
 * A window ends at the last sentence end (or newline) in its second half
 * when there is one, so chunks rarely cut a sentence in two.
 */
export function chunkText(text: string, options: ChunkOptions): TextChunk[] {
  const { maxChars, overlap } = options;
  if (maxChars <= 0 || overlap < 0 || overlap >= maxChars) {
    throw new RangeError(`Invalid chunk options: maxChars=${maxChars}, overlap=${overlap}`);
  }

  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxChars, text.length);

    if (end < text.length) {
      const half = start + Math.floor(maxChars / 2);
      const sentenceBreak = text.lastIndexOf(".", end - 1);
      if (sentenceBreak > half) {
        end = sentenceBreak + 1;
      } else {
        const lineBreak = text.lastIndexOf("\n", end - 1);
        if (lineBreak > half) {
          end = lineBreak;
        }
      }
    }

    const content = text.slice(start, end).trim();
    if (content) {
      chunks.push({
        index: chunks.length,
        content,
        tokenCount: encode(content).length,
        metadata: { startChar: start, endChar: end },
      });
    }

    if (end >= text.length) break;

    // Step back by the overlap, but always make progress
    const next = end - overlap;
    start = next > start ? next : end;
  }

  return chunks;
}
