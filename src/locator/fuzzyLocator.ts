import { PageTextLayer, TextRect } from './textLayer';
import { collapseWhitespace, getSentenceSplitter, SentenceSplitter } from '../utils/sentences';
import { errorMessage } from '../utils/errors';

export const ANSWER_NOT_FOUND = '(Answer not found)';

/** Sentences this short are too generic to highlight on their own. */
const MIN_SENTENCE_LENGTH = 15;
/** Single-word fallback skips words this short or shorter. */
const MIN_WORD_LENGTH = 3;

export type LocateStrategy = 'exact' | 'sentence' | 'ngram';

/** `secondary` marks lower-confidence n-gram matches. */
export type HighlightTone = 'primary' | 'secondary';

export const HIGHLIGHT_COLORS: Record<HighlightTone, string> = {
  primary: '#ffff00',
  secondary: '#ffcc00',
};

export interface LocatedRegion {
  rect: TextRect;
  strategy: LocateStrategy;
  tone: HighlightTone;
  color: string;
  matchedText: string;
}

/** Receives each region to draw. May throw for a region it cannot mark. */
export interface HighlightSink {
  mark(region: LocatedRegion): void;
}

export interface LocateOptions {
  sink?: HighlightSink;
  splitter?: SentenceSplitter | null;
}

function regionsFor(layer: PageTextLayer, needle: string, strategy: LocateStrategy): LocatedRegion[] {
  const tone: HighlightTone = strategy === 'ngram' ? 'secondary' : 'primary';
  return layer.search(needle).map(rect => ({
    rect,
    strategy,
    tone,
    color: HIGHLIGHT_COLORS[tone],
    matchedText: needle,
  }));
}

export function ngramCandidates(answer: string): string[] {
  const words = answer.split(' ').filter(word => word.length > 0);
  if (words.length > 3) {
    const phrases: string[] = [];
    for (let i = 0; i + 3 <= words.length; i++) {
      phrases.push(words.slice(i, i + 3).join(' '));
      if (i + 4 <= words.length) {
        phrases.push(words.slice(i, i + 4).join(' '));
      }
    }
    return phrases;
  }
  return words.filter(word => word.length > MIN_WORD_LENGTH);
}

function markAll(regions: LocatedRegion[], sink: HighlightSink | undefined): LocatedRegion[] {
  if (!sink) {
    return regions;
  }
  const marked: LocatedRegion[] = [];
  for (const region of regions) {
    try {
      sink.mark(region);
      marked.push(region);
    } catch (error) {
      console.warn(`⚠️ Could not mark region for "${region.matchedText}": ${errorMessage(error)}`);
    }
  }
  return marked;
}

/**
 * Finds where an answer (possibly re-punctuated or loosely quoted by a
 * language model) sits on a page. Tries the whole answer, then its
 * sentences, then 3- and 4-word runs; the first step that marks anything
 * wins. The not-found sentinel and empty answers are never searched.
 */
export function locateAnswer(layer: PageTextLayer, answer: string, options: LocateOptions = {}): LocatedRegion[] {
  const text = collapseWhitespace(answer);
  if (!text || text === ANSWER_NOT_FOUND) {
    return [];
  }

  const splitter = options.splitter === undefined ? getSentenceSplitter() : options.splitter;

  const steps: Array<() => LocatedRegion[]> = [
    () => regionsFor(layer, text, 'exact'),
    () => {
      if (!splitter) {
        return [];
      }
      return splitter(text)
        .filter(sentence => sentence.length > MIN_SENTENCE_LENGTH)
        .flatMap(sentence => regionsFor(layer, sentence, 'sentence'));
    },
    () => ngramCandidates(text).flatMap(phrase => regionsFor(layer, phrase, 'ngram')),
  ];

  for (const step of steps) {
    const marked = markAll(step(), options.sink);
    if (marked.length > 0) {
      return marked;
    }
  }
  return [];
}
