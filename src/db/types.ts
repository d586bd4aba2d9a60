import { Outcome } from '../utils/outcome';

export type BackendMode = 'primary-db' | 'secondary-db' | 'flat-file';

/** Fixed-shape metadata carried by every question through retrieval. */
export interface QuestionMetadata {
  subject: string;
  sub_topic: string;
  marks: number;
  year: string;
  semester: string;
  branch: string;
  unit: string;
}

/** Dictionary form of a stored question. */
export interface QuestionRecord extends QuestionMetadata {
  id: number;
  question: string;
}

/**
 * A question as handed to `storeQuestions`. Everything but `question` is
 * optional; records without question text are dropped.
 */
export interface QuestionInput {
  question?: string | null;
  sub_topic?: string;
  marks?: number;
  year?: string;
  semester?: string;
  branch?: string;
  unit?: string;
}

export interface UploadRecord {
  id: number;
  filename: string;
  subject: string;
  timestamp: string;
}

export interface CreateSubjectResult {
  subject: string;
  created: boolean;
}

export interface QuestionRepository {
  readonly mode: BackendMode;
  listSubjects(): Promise<Outcome<string[]>>;
  createSubject(name: string): Promise<Outcome<CreateSubjectResult>>;
  storeQuestions(subject: string, records: QuestionInput[]): Promise<Outcome<number>>;
  replaceSubject(subject: string, records: QuestionInput[]): Promise<Outcome<number>>;
  listQuestionsBySubject(subject: string): Promise<Outcome<QuestionRecord[]>>;
  listAllQuestions(): Promise<Outcome<QuestionRecord[]>>;
  recordUpload(filename: string, subject: string): Promise<Outcome<UploadRecord>>;
  listUploadHistory(limit?: number): Promise<Outcome<UploadRecord[]>>;
}
