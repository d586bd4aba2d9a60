export type SentenceSplitter = (text: string) => string[];

/**
 * Locale-aware sentence splitter backed by `Intl.Segmenter`, or `null` on a
 * runtime built without it.
 */
export function getSentenceSplitter(locale: string = 'en'): SentenceSplitter | null {
  if (typeof Intl === 'undefined' || typeof Intl.Segmenter !== 'function') {
    return null;
  }
  const segmenter = new Intl.Segmenter(locale, { granularity: 'sentence' });
  return (text: string) =>
    Array.from(segmenter.segment(text), part => part.segment.trim()).filter(sentence => sentence.length > 0);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
