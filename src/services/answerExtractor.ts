import { ANSWER_NOT_FOUND } from '../locator/fuzzyLocator';
import { AiProvider } from '../utils/openaiService';
import { errorMessage } from '../utils/errors';

const NOTE_CONTEXT_CHARS = 2000;

export function answerPrompt(noteText: string, question: string): string {
  return `
You are reading a note and a past year question. Identify the sentence(s) from the note that best answer the question.

Question:
"${question}"

Note:
"""${noteText.substring(0, NOTE_CONTEXT_CHARS)}"""

Instructions:
- Return ONLY the most relevant sentence(s) from the note that answer the question
- Use the EXACT wording from the note
- Do NOT rephrase or explain
- Do NOT include the question again
- If no relevant answer exists, return "Answer not found"
`;
}

export function cleanAnswer(reply: string): string {
  const trimmed = reply.trim();
  if (!trimmed || /^\(?answer not found/i.test(trimmed)) {
    return ANSWER_NOT_FOUND;
  }
  const unquoted = trimmed.replace(/^["']+|["']+$/g, '').trim();
  return unquoted || ANSWER_NOT_FOUND;
}

/**
 * Pulls the note sentences that answer a question. One extractor lives for
 * one processing run; its memo avoids asking twice for the same page and
 * question within that run.
 */
export class AnswerExtractor {
  private readonly memo = new Map<string, string>();

  constructor(private readonly ai: AiProvider) {}

  async extract(noteText: string, question: string): Promise<string> {
    const key = `${noteText.substring(0, 100)}\u0000${question.substring(0, 50)}`;
    const cached = this.memo.get(key);
    if (cached !== undefined) {
      return cached;
    }

    try {
      const answer = cleanAnswer(await this.ai.generate(answerPrompt(noteText, question)));
      this.memo.set(key, answer);
      return answer;
    } catch (error) {
      console.error('✗ Error extracting answer:', errorMessage(error));
      return ANSWER_NOT_FOUND;
    }
  }
}
