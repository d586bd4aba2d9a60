import { AiProvider } from '../utils/openaiService';
import { errorMessage } from '../utils/errors';

export const FALLBACK_SUBTOPIC = 'General';

export function subtopicPrompt(text: string): string {
  return (
    `Read the following academic content and suggest the most relevant subtopic ` +
    `(like 'Firewall', 'Water Pollution', etc.) in 2-3 words:\n\n${text}\n\nSubtopic:`
  );
}

/** Short topic label for a piece of notes; "General" whenever generation fails. */
export async function inferSubtopic(ai: AiProvider, text: string): Promise<string> {
  try {
    const label = (await ai.generate(subtopicPrompt(text))).trim();
    return label || FALLBACK_SUBTOPIC;
  } catch (error) {
    console.error('✗ Subtopic inference failed:', errorMessage(error));
    return FALLBACK_SUBTOPIC;
  }
}
