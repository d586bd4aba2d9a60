import OpenAI from 'openai';
import { OpenAIConfig } from '../config/env';
import { errorMessage } from './errors';

/** Embedding and text generation, as the matcher and extractor need them. */
export interface AiProvider {
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
  generate(prompt: string): Promise<string>;
}

// text-embedding-ada-002 accepts up to 2048 inputs per request; smaller
// batches keep each call well under the rate limits
const BATCH_SIZE = 100;
const MAX_INPUT_CHARS = 8000;

function prepareInput(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_INPUT_CHARS ? trimmed.substring(0, MAX_INPUT_CHARS) : trimmed;
}

export class OpenAIProvider implements AiProvider {
  private client: OpenAI | null = null;

  constructor(private readonly config: OpenAIConfig) {}

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new Error('OPENAI_API_KEY is not set in environment variables');
      }
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeoutMs,
        maxRetries: 2,
      });
    }
    return this.client;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    if (!embedding) {
      throw new Error('Embedding response was empty');
    }
    return embedding;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const client = this.getClient();
    const allEmbeddings: number[][] = [];
    const totalBatches = Math.ceil(texts.length / BATCH_SIZE);

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE).map(prepareInput);
      const batchNum = Math.floor(i / BATCH_SIZE) + 1;

      try {
        const startTime = Date.now();
        const response = await client.embeddings.create({
          model: this.config.embeddingModel,
          input: batch,
        });
        if (response.data.length !== batch.length) {
          throw new Error(`Unexpected response: expected ${batch.length} embeddings, got ${response.data.length}`);
        }
        // The API may return items out of order; index restores input order
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...ordered.map(item => item.embedding));
        if (totalBatches > 1) {
          console.log(`✓ Embedded batch ${batchNum}/${totalBatches} in ${Date.now() - startTime}ms`);
        }
      } catch (batchError) {
        console.error(`✗ Error in embedding batch ${batchNum}:`, errorMessage(batchError));
        throw new Error(`Failed to get embeddings for batch ${batchNum}: ${errorMessage(batchError)}`);
      }
    }

    return allEmbeddings;
  }

  async generate(prompt: string): Promise<string> {
    const client = this.getClient();
    const completion = await client.chat.completions.create({
      model: this.config.chatModel,
      temperature: 0,
      messages: [{ role: 'user', content: prompt }],
    });
    return completion.choices[0]?.message?.content ?? '';
  }
}
