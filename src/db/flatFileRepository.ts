import { readSubjectsFile } from './subjectsFile';
import {
  CreateSubjectResult,
  QuestionInput,
  QuestionRecord,
  QuestionRepository,
  UploadRecord,
} from './types';
import { connectivityError, ok, Outcome, OutcomeFailure } from '../utils/outcome';

function unavailable(operation: string): OutcomeFailure {
  return connectivityError(`${operation} is unavailable in flat-file mode (no database reachable)`);
}

/**
 * Read-only repository used when neither database answered at startup. It
 * only knows the subject names listed in the subjects file.
 */
export class FlatFileQuestionRepository implements QuestionRepository {
  readonly mode = 'flat-file' as const;

  constructor(
    private readonly subjectsFile: string,
    private readonly defaultSubjects: string[]
  ) {}

  async listSubjects(): Promise<Outcome<string[]>> {
    const file = await readSubjectsFile(this.subjectsFile, this.defaultSubjects);
    return ok(file.subjects);
  }

  async createSubject(_name: string): Promise<Outcome<CreateSubjectResult>> {
    return unavailable('Creating a subject');
  }

  async storeQuestions(_subject: string, _records: QuestionInput[]): Promise<Outcome<number>> {
    return unavailable('Storing questions');
  }

  async replaceSubject(_subject: string, _records: QuestionInput[]): Promise<Outcome<number>> {
    return unavailable('Replacing questions');
  }

  async listQuestionsBySubject(_subject: string): Promise<Outcome<QuestionRecord[]>> {
    return unavailable('Listing questions');
  }

  async listAllQuestions(): Promise<Outcome<QuestionRecord[]>> {
    return unavailable('Listing questions');
  }

  async recordUpload(_filename: string, _subject: string): Promise<Outcome<UploadRecord>> {
    return unavailable('Recording an upload');
  }

  async listUploadHistory(_limit?: number): Promise<Outcome<UploadRecord[]>> {
    return unavailable('Reading upload history');
  }
}
