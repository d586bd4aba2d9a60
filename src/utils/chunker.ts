import { getSentenceSplitter, SentenceSplitter } from './sentences';

const CHUNK_SIZE = 1000; // characters per chunk when sentences are unavailable

export function chunkText(text: string, chunkSize: number = CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  for (let startIndex = 0; startIndex < text.length; startIndex += chunkSize) {
    chunks.push(text.substring(startIndex, startIndex + chunkSize));
  }
  return chunks;
}

/**
 * Groups sentences into chunks of at most `maxSentences`, joined by single
 * spaces. Without a sentence splitter, falls back to fixed 1000-character
 * chunks with no overlap.
 */
export function chunkBySentenceCount(
  text: string,
  maxSentences: number = 5,
  splitter: SentenceSplitter | null = getSentenceSplitter()
): string[] {
  if (!splitter) {
    return chunkText(text);
  }

  const size = Math.max(1, Math.floor(maxSentences));
  const sentences = splitter(text);
  const chunks: string[] = [];
  for (let i = 0; i < sentences.length; i += size) {
    chunks.push(sentences.slice(i, i + size).join(' '));
  }
  return chunks;
}
