import { QuestionMetadata } from '../db/types';

export interface IndexedQuestion {
  question: string;
  metadata: QuestionMetadata;
}

export interface QuestionVector {
  entry: IndexedQuestion;
  embedding: number[];
}

export interface SimilarQuestion extends IndexedQuestion {
  similarity: number;
}

export function cosineSimilarity(vecA: number[], vecB: number[]): number {
  if (vecA.length !== vecB.length) {
    throw new Error(`Vectors must have the same length (${vecA.length} vs ${vecB.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    normA += vecA[i] * vecA[i];
    normB += vecB[i] * vecB[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

/**
 * Flat in-memory similarity index over one subject's questions. Built in one
 * go and never updated; a new corpus means a new index.
 */
export class QuestionIndex {
  private readonly vectors: ReadonlyArray<QuestionVector>;

  constructor(entries: IndexedQuestion[], embeddings: number[][]) {
    if (entries.length !== embeddings.length) {
      throw new Error(`Mismatch: got ${embeddings.length} embeddings for ${entries.length} questions`);
    }
    this.vectors = entries.map((entry, i) => ({ entry, embedding: embeddings[i] }));
  }

  get size(): number {
    return this.vectors.length;
  }

  // Ties keep corpus order, so equal scores come back deterministically
  findSimilar(queryEmbedding: number[], topK: number = 5, minSimilarity: number = -1): SimilarQuestion[] {
    if (topK <= 0) {
      return [];
    }
    return this.vectors
      .map((vector, position) => ({
        position,
        result: { ...vector.entry, similarity: cosineSimilarity(queryEmbedding, vector.embedding) },
      }))
      .filter(({ result }) => result.similarity >= minSimilarity)
      .sort((a, b) => b.result.similarity - a.result.similarity || a.position - b.position)
      .slice(0, topK)
      .map(({ result }) => result);
  }
}
