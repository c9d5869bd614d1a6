/**
 * Sentence-aware text chunking for the synthesis relay.
 *
 * The relay rejects oversized inputs, so long text is packed greedily into
 * segments under a character budget. Segments only break between sentences;
 * a single sentence longer than the budget is emitted on its own.
 */

export const DEFAULT_MAX_CHUNK_CHARS = 2000;

// Terminator stays with its sentence, the whitespace run after it is consumed.
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY).filter((sentence) => sentence.length > 0);
}

export function chunkText(text: string, maxChars: number = DEFAULT_MAX_CHUNK_CHARS): string[] {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) {
    return [trimmed];
  }

  const chunks: string[] = [];
  let buffer = '';

  for (const sentence of splitSentences(trimmed)) {
    // The separator is counted even for an empty buffer.
    if (buffer.length + sentence.length + 1 <= maxChars) {
      buffer = buffer ? `${buffer} ${sentence}` : sentence;
      continue;
    }
    if (buffer) {
      chunks.push(buffer);
    }
    buffer = sentence;
  }

  if (buffer) {
    chunks.push(buffer);
  }
  return chunks;
}
