import { QuestionRepository } from '../db/types';
import { chunkBySentenceCount } from '../utils/chunker';
import { AiProvider } from '../utils/openaiService';
import { isOk, OutcomeFailureStatus } from '../utils/outcome';
import { getSentenceSplitter, SentenceSplitter } from '../utils/sentences';
import { QuestionMatch, search } from './retrieval';
import { inferSubtopic } from './subtopic';

export const DEFAULT_MATCHES_PER_CHUNK = 3;
export const DEFAULT_SENTENCES_PER_CHUNK = 5;

export interface ChunkResult {
  chunk: string;
  subtopic: string;
  matches: QuestionMatch[];
  matchCount: number;
  searchError?: { status: OutcomeFailureStatus; error: string };
}

export interface MatchChunksInput {
  repository: QuestionRepository;
  ai: AiProvider;
  text: string;
  subject: string;
  k?: number;
  maxSentences?: number;
  /** Defaults to the runtime's sentence splitter; `null` forces fixed-size chunks. */
  splitter?: SentenceSplitter | null;
}

/**
 * Splits plain notes text into sentence-count chunks and, for each non-blank
 * chunk in order, labels its subtopic and finds the nearest questions of the
 * subject.
 */
export async function matchNoteChunks(input: MatchChunksInput): Promise<ChunkResult[]> {
  const splitter = input.splitter === undefined ? getSentenceSplitter() : input.splitter;
  const chunks = chunkBySentenceCount(input.text, input.maxSentences ?? DEFAULT_SENTENCES_PER_CHUNK, splitter);

  const results: ChunkResult[] = [];
  for (const chunk of chunks) {
    if (!chunk.trim()) {
      continue;
    }

    const subtopic = await inferSubtopic(input.ai, chunk);
    const found = await search(input.repository, input.ai, chunk, {
      subject: input.subject,
      k: input.k ?? DEFAULT_MATCHES_PER_CHUNK,
    });

    if (isOk(found)) {
      results.push({ chunk, subtopic, matches: found.value, matchCount: found.value.length });
    } else {
      results.push({
        chunk,
        subtopic,
        matches: [],
        matchCount: 0,
        searchError: { status: found.status, error: found.error },
      });
    }
  }
  return results;
}
