import { QuestionMetadata, QuestionRepository, UploadRecord } from '../db/types';
import { PageTextLayer } from '../locator/textLayer';
import { ANSWER_NOT_FOUND, LocatedRegion, locateAnswer } from '../locator/fuzzyLocator';
import { PageBoundsSink } from '../locator/pageBoundsSink';
import { AiProvider } from '../utils/openaiService';
import { isOk, OutcomeFailureStatus } from '../utils/outcome';
import { AnswerExtractor } from './answerExtractor';
import { search } from './retrieval';
import { FALLBACK_SUBTOPIC, inferSubtopic } from './subtopic';

const SUBTOPIC_CONTEXT_CHARS = 1000;
export const DEFAULT_MATCHES_PER_PAGE = 3;

export interface NotesPage {
  pageNumber: number;
  text: string;
  layer: PageTextLayer;
  width?: number;
  height?: number;
}

export interface PageMatch {
  question: string;
  metadata: QuestionMetadata;
  score: number;
  answer: string;
  regions: LocatedRegion[];
}

export interface PageResult {
  pageNumber: number;
  subtopic: string;
  matches: PageMatch[];
  highlighted: boolean;
  /** Set when matching could not run for this page. */
  searchError?: { status: OutcomeFailureStatus; error: string };
}

export interface NotesRunResult {
  subject: string;
  filename: string;
  totalPages: number;
  highlightedPages: number;
  pages: PageResult[];
  upload: UploadRecord | null;
}

export interface ProcessNotesInput {
  repository: QuestionRepository;
  ai: AiProvider;
  pages: NotesPage[];
  subject: string;
  filename: string;
  k?: number;
  requestId?: string | number;
}

async function processPage(
  input: ProcessNotesInput,
  extractor: AnswerExtractor,
  page: NotesPage
): Promise<PageResult> {
  if (!page.text.trim()) {
    return { pageNumber: page.pageNumber, subtopic: FALLBACK_SUBTOPIC, matches: [], highlighted: false };
  }

  const found = await search(input.repository, input.ai, page.text, {
    subject: input.subject,
    k: input.k ?? DEFAULT_MATCHES_PER_PAGE,
  });

  const matches: PageMatch[] = [];
  if (isOk(found)) {
    for (const hit of found.value) {
      const answer = await extractor.extract(page.text, hit.question);
      const sink = page.width && page.height ? new PageBoundsSink(page.width, page.height) : undefined;
      const regions = answer === ANSWER_NOT_FOUND ? [] : locateAnswer(page.layer, answer, { sink });
      matches.push({ question: hit.question, metadata: hit.metadata, score: hit.score, answer, regions });
    }
  }

  const subtopic = await inferSubtopic(input.ai, page.text.substring(0, SUBTOPIC_CONTEXT_CHARS));

  const result: PageResult = {
    pageNumber: page.pageNumber,
    subtopic,
    matches,
    highlighted: matches.some(match => match.regions.length > 0),
  };
  if (!isOk(found)) {
    result.searchError = { status: found.status, error: found.error };
  }
  return result;
}

/**
 * One notes run: match questions to every page, pull and locate the
 * answering sentences, label the page, then record the upload. Pages are
 * handled one at a time and reported in page order.
 */
export async function processNotes(input: ProcessNotesInput): Promise<NotesRunResult> {
  const tag = input.requestId !== undefined ? `[${input.requestId}] ` : '';
  const extractor = new AnswerExtractor(input.ai);
  const pages: PageResult[] = [];

  for (const page of input.pages) {
    const result = await processPage(input, extractor, page);
    console.log(
      `${tag}Page ${page.pageNumber}/${input.pages.length}: ${result.matches.length} matches, ` +
        `${result.highlighted ? 'highlighted' : 'no highlights'}`
    );
    pages.push(result);
  }

  const upload = await input.repository.recordUpload(input.filename, input.subject);
  const highlightedPages = pages.filter(page => page.highlighted).length;
  console.log(`${tag}✓ Highlighted answers on ${highlightedPages}/${pages.length} pages`);

  return {
    subject: input.subject,
    filename: input.filename,
    totalPages: pages.length,
    highlightedPages,
    pages,
    upload: isOk(upload) ? upload.value : null,
  };
}
