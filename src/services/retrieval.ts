import { QuestionRecord, QuestionRepository } from '../db/types';
import { AiProvider } from '../utils/openaiService';
import { IndexedQuestion, QuestionIndex } from '../utils/vectorStore';
import { connectivityError, isOk, ok, Outcome } from '../utils/outcome';
import { errorMessage } from '../utils/errors';

export interface SearchOptions {
  subject?: string;
  k?: number;
}

export interface QuestionMatch extends IndexedQuestion {
  score: number;
}

export const DEFAULT_TOP_K = 5;

function toIndexedQuestion(record: QuestionRecord): IndexedQuestion {
  return {
    question: record.question,
    metadata: {
      subject: record.subject,
      sub_topic: record.sub_topic,
      marks: record.marks,
      year: record.year,
      semester: record.semester,
      branch: record.branch,
      unit: record.unit,
    },
  };
}

/**
 * Embeds the (optionally subject-scoped) question corpus into a fresh index.
 * `null` means there is nothing to index.
 */
export async function buildIndex(
  repository: QuestionRepository,
  ai: AiProvider,
  subject?: string
): Promise<Outcome<QuestionIndex | null>> {
  const questions = subject
    ? await repository.listQuestionsBySubject(subject)
    : await repository.listAllQuestions();
  if (!isOk(questions)) {
    return questions;
  }
  if (questions.value.length === 0) {
    return ok(null);
  }

  try {
    const entries = questions.value.map(toIndexedQuestion);
    const embeddings = await ai.embedMany(entries.map(entry => entry.question));
    return ok(new QuestionIndex(entries, embeddings));
  } catch (error) {
    console.error(`✗ Error building question index${subject ? ` for "${subject}"` : ''}:`, errorMessage(error));
    return connectivityError(errorMessage(error));
  }
}

/**
 * Top-k questions nearest to `text`. The index is rebuilt on every call so
 * results always reflect the stored corpus. A failed outcome means nothing
 * could be searched; callers treat it like an empty result.
 */
export async function search(
  repository: QuestionRepository,
  ai: AiProvider,
  text: string,
  options: SearchOptions = {}
): Promise<Outcome<QuestionMatch[]>> {
  const k = options.k ?? DEFAULT_TOP_K;
  if (!text.trim() || k <= 0) {
    return ok([]);
  }

  const index = await buildIndex(repository, ai, options.subject);
  if (!isOk(index)) {
    return index;
  }
  if (!index.value) {
    return ok([]);
  }

  try {
    const queryEmbedding = await ai.embed(text);
    const matches = index.value.findSimilar(queryEmbedding, k).map(({ similarity, ...entry }) => ({
      ...entry,
      score: similarity,
    }));
    return ok(matches);
  } catch (error) {
    console.error('✗ Semantic search error:', errorMessage(error));
    return connectivityError(errorMessage(error));
  }
}
