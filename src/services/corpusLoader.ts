import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { writeSubjectsFile } from '../db/subjectsFile';
import { BackendMode, QuestionInput, QuestionRepository } from '../db/types';
import { errorMessage } from '../utils/errors';
import { isOk, storedCount } from '../utils/outcome';

const optionalText = z.preprocess(
  value => (value === undefined || value === null ? undefined : String(value)),
  z.string().optional()
);

const corpusRecordSchema = z.object({
  question: z.preprocess(value => (typeof value === 'string' ? value.trim() : value), z.string().min(1)),
  sub_topic: optionalText,
  topic: optionalText,
  marks: z.unknown().optional(),
  year: optionalText,
  semester: optionalText,
  branch: optionalText,
  unit: optionalText,
});

const NUMERIC = /^\d+(\.\d+)?$/;
const LOWERCASE_WORDS = new Set(['and', 'of', 'the', 'in', 'for', 'to']);

export function coerceMarks(value: unknown): number {
  if (typeof value !== 'number' && typeof value !== 'string') {
    return 0;
  }
  const text = String(value).trim();
  return NUMERIC.test(text) ? Math.trunc(Number(text)) : 0;
}

/**
 * Normalizes one entry of a subject's JSON corpus. Returns `null` for
 * entries without question text; those are skipped, never failing the file.
 */
export function normalizeCorpusRecord(raw: unknown): QuestionInput | null {
  const parsed = corpusRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const item = parsed.data;
  return {
    question: item.question,
    sub_topic: item.sub_topic ?? item.topic ?? 'General',
    marks: coerceMarks(item.marks),
    year: item.year ?? '2024',
    semester: item.semester ?? '',
    branch: item.branch ?? '',
    unit: item.unit ?? '',
  };
}

/** `Probability-and-Statistics.json` → `Probability and Statistics`. */
export function subjectNameFromFile(filename: string): string {
  const stem = path.basename(filename, path.extname(filename));
  return stem
    .split(/[-_\s]+/)
    .filter(word => word.length > 0)
    .map((word, index) => {
      const lower = word.toLowerCase();
      if (index > 0 && LOWERCASE_WORDS.has(lower)) {
        return lower;
      }
      return word[0].toUpperCase() + word.slice(1);
    })
    .join(' ');
}

export async function readCorpusFile(filePath: string): Promise<QuestionInput[]> {
  const data: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  if (!Array.isArray(data)) {
    throw new Error(`${filePath} must contain a JSON array of questions`);
  }
  const records: QuestionInput[] = [];
  for (const item of data) {
    const record = normalizeCorpusRecord(item);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

export interface SubjectLoadResult {
  subject: string;
  file: string;
  stored: number;
  error?: string;
}

export interface CorpusLoadSummary {
  mode: BackendMode;
  subjects: SubjectLoadResult[];
  totalStored: number;
}

export interface CorpusLoadOptions {
  subjectsDir: string;
  subjectsFile: string;
}

async function listCorpusFiles(subjectsDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(subjectsDir);
    return entries.filter(entry => entry.toLowerCase().endsWith('.json')).sort();
  } catch (error) {
    console.warn(`⚠️ Could not read ${subjectsDir}: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Loads every `<subject>.json` in the subjects directory, replacing each
 * subject's questions in one transaction, then rewrites the subjects file so
 * flat-file mode offers the same list.
 */
export async function loadCorpus(repository: QuestionRepository, options: CorpusLoadOptions): Promise<CorpusLoadSummary> {
  const files = await listCorpusFiles(options.subjectsDir);
  const results: SubjectLoadResult[] = [];

  for (const file of files) {
    const subject = subjectNameFromFile(file);
    const filePath = path.join(options.subjectsDir, file);

    let records: QuestionInput[];
    try {
      records = await readCorpusFile(filePath);
    } catch (error) {
      console.error(`✗ Error loading ${filePath}:`, errorMessage(error));
      results.push({ subject, file, stored: 0, error: errorMessage(error) });
      continue;
    }

    if (repository.mode === 'flat-file') {
      results.push({ subject, file, stored: 0 });
      continue;
    }
    if (records.length === 0) {
      console.warn(`⚠️ ${filePath} has no usable questions, keeping existing ${subject} questions`);
      results.push({ subject, file, stored: 0 });
      continue;
    }

    console.log(`📚 Loading ${subject} from ${filePath}`);
    const outcome = await repository.replaceSubject(subject, records);
    const stored = storedCount(outcome);
    if (isOk(outcome)) {
      console.log(`✓ Loaded ${stored} questions for ${subject}`);
      results.push({ subject, file, stored });
    } else {
      results.push({ subject, file, stored, error: outcome.error });
    }
  }

  const available = results.filter(result => !result.error).map(result => result.subject);
  try {
    await writeSubjectsFile(options.subjectsFile, available, {
      created: 'auto-generated',
      description: 'Available subjects from JSON files (database fallback)',
      data_source: options.subjectsDir,
      mode: repository.mode,
    });
    console.log(`✓ Wrote ${options.subjectsFile} with ${available.length} subjects`);
  } catch (error) {
    console.error(`✗ Error writing ${options.subjectsFile}:`, errorMessage(error));
  }

  return {
    mode: repository.mode,
    subjects: results,
    totalStored: results.reduce((sum, result) => sum + result.stored, 0),
  };
}
