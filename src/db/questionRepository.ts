import {
  CannotExecuteNotConnectedError,
  ConnectionIsNotSetError,
  DataSource,
  EntityManager,
} from 'typeorm';
import { QuestionEntity, UploadRecordEntity } from './entities';
import {
  BackendMode,
  CreateSubjectResult,
  QuestionInput,
  QuestionRecord,
  QuestionRepository,
  UploadRecord,
} from './types';
import { connectivityError, dataError, ok, Outcome, OutcomeFailure } from '../utils/outcome';
import { errorMessage } from '../utils/errors';

const DEFAULT_INSERT_CHUNK = 100;

type QuestionRow = Omit<QuestionEntity, 'id'>;

export function hasQuestionText(record: QuestionInput): record is QuestionInput & { question: string } {
  return typeof record.question === 'string' && record.question.trim().length > 0;
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'SQLITE_CANTOPEN',
  // Postgres: admin shutdown, crash shutdown, cannot connect now
  '57P01',
  '57P02',
  '57P03',
]);

const CONNECTION_MESSAGE = /connection terminated|connection is not open|not connected|timeout exceeded when trying to connect/i;

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isConnectionCode(code: string | undefined): boolean {
  // SQLSTATE class 08 is "connection exception"
  return code !== undefined && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'));
}

/**
 * Sorts a failed database call into a connectivity error (the store could not
 * be reached) or a data error (the store answered and refused the work).
 */
export function classifyFailure(error: unknown): OutcomeFailure {
  const message = errorMessage(error);
  if (error instanceof CannotExecuteNotConnectedError || error instanceof ConnectionIsNotSetError) {
    return connectivityError(message);
  }
  const driverError =
    typeof error === 'object' && error !== null && 'driverError' in error ? error.driverError : undefined;
  if (isConnectionCode(errorCode(error)) || isConnectionCode(errorCode(driverError))) {
    return connectivityError(message);
  }
  return CONNECTION_MESSAGE.test(message) ? connectivityError(message) : dataError(message);
}

/**
 * Row inserted by `createSubject` so an otherwise empty subject shows up in
 * the subject list.
 */
export function placeholderQuestion(subject: string): QuestionRow {
  return {
    subject,
    subTopic: 'General',
    question: `Sample question for ${subject}`,
    marks: 1,
    year: '2024',
    semester: '1',
    branch: 'General',
    unit: '1',
  };
}

export function toQuestionRecord(entity: QuestionEntity): QuestionRecord {
  return {
    id: entity.id,
    subject: entity.subject,
    sub_topic: entity.subTopic,
    question: entity.question,
    marks: entity.marks,
    year: entity.year,
    semester: entity.semester,
    branch: entity.branch,
    unit: entity.unit,
  };
}

export function toUploadRecord(entity: UploadRecordEntity): UploadRecord {
  return {
    id: entity.id,
    filename: entity.filename,
    subject: entity.subject,
    timestamp: entity.timestamp.toISOString(),
  };
}

function toQuestionRows(subject: string, records: QuestionInput[]): QuestionRow[] {
  const rows: QuestionRow[] = [];
  for (const record of records) {
    if (!hasQuestionText(record)) {
      continue;
    }
    rows.push({
      subject,
      subTopic: record.sub_topic ?? '',
      question: record.question,
      marks: record.marks ?? 0,
      year: record.year ?? '',
      semester: record.semester ?? '',
      branch: record.branch ?? '',
      unit: record.unit ?? '',
    });
  }
  return rows;
}

export interface RelationalRepositoryOptions {
  /** Rows per INSERT statement inside a batch transaction. */
  insertChunk?: number;
}

/**
 * Question repository over a TypeORM data source. The same class serves the
 * PostgreSQL and the SQLite backend; only `mode` differs.
 */
export class RelationalQuestionRepository implements QuestionRepository {
  private readonly insertChunk: number;

  constructor(
    private readonly dataSource: DataSource,
    readonly mode: Exclude<BackendMode, 'flat-file'>,
    options: RelationalRepositoryOptions = {}
  ) {
    this.insertChunk = options.insertChunk ?? DEFAULT_INSERT_CHUNK;
  }

  async listSubjects(): Promise<Outcome<string[]>> {
    try {
      const rows = await this.dataSource
        .getRepository(QuestionEntity)
        .createQueryBuilder('q')
        .select('q.subject', 'subject')
        .distinct(true)
        .orderBy('q.subject', 'ASC')
        .getRawMany<{ subject: string }>();
      return ok(rows.map(row => row.subject));
    } catch (error) {
      console.error('✗ Error listing subjects:', errorMessage(error));
      return this.failure(error);
    }
  }

  async createSubject(name: string): Promise<Outcome<CreateSubjectResult>> {
    const subject = name.trim();
    if (!subject) {
      return dataError('Subject name is required');
    }

    try {
      const created = await this.dataSource.transaction(async manager => {
        const existing = await manager.count(QuestionEntity, { where: { subject } });
        if (existing > 0) {
          return false;
        }
        await manager.save(QuestionEntity, manager.create(QuestionEntity, placeholderQuestion(subject)));
        return true;
      });
      if (created) {
        console.log(`✓ Created subject: ${subject}`);
      }
      return ok({ subject, created });
    } catch (error) {
      console.error(`✗ Error creating subject "${subject}":`, errorMessage(error));
      return this.failure(error);
    }
  }

  async storeQuestions(subject: string, records: QuestionInput[]): Promise<Outcome<number>> {
    const rows = toQuestionRows(subject, records);
    if (rows.length === 0) {
      return ok(0);
    }

    try {
      await this.dataSource.transaction(manager => this.insertRows(manager, rows));
      return ok(rows.length);
    } catch (error) {
      console.error(`✗ Error storing questions for "${subject}" (batch rolled back):`, errorMessage(error));
      return this.failure(error);
    }
  }

  async replaceSubject(subject: string, records: QuestionInput[]): Promise<Outcome<number>> {
    const rows = toQuestionRows(subject, records);

    try {
      await this.dataSource.transaction(async manager => {
        await manager.delete(QuestionEntity, { subject });
        await this.insertRows(manager, rows);
      });
      return ok(rows.length);
    } catch (error) {
      console.error(`✗ Error replacing questions for "${subject}" (rolled back):`, errorMessage(error));
      return this.failure(error);
    }
  }

  async listQuestionsBySubject(subject: string): Promise<Outcome<QuestionRecord[]>> {
    try {
      const entities = await this.dataSource.getRepository(QuestionEntity).find({
        where: { subject },
        order: { id: 'ASC' },
      });
      return ok(entities.map(toQuestionRecord));
    } catch (error) {
      console.error(`✗ Error reading questions for "${subject}":`, errorMessage(error));
      return this.failure(error);
    }
  }

  async listAllQuestions(): Promise<Outcome<QuestionRecord[]>> {
    try {
      const entities = await this.dataSource.getRepository(QuestionEntity).find({ order: { id: 'ASC' } });
      return ok(entities.map(toQuestionRecord));
    } catch (error) {
      console.error('✗ Error reading questions:', errorMessage(error));
      return this.failure(error);
    }
  }

  async recordUpload(filename: string, subject: string): Promise<Outcome<UploadRecord>> {
    try {
      const record = await this.dataSource.transaction(async manager => {
        const saved = await manager.save(UploadRecordEntity, manager.create(UploadRecordEntity, { filename, subject }));
        return manager.findOneByOrFail(UploadRecordEntity, { id: saved.id });
      });
      return ok(toUploadRecord(record));
    } catch (error) {
      console.error(`✗ Error adding upload history for "${filename}":`, errorMessage(error));
      return this.failure(error);
    }
  }

  async listUploadHistory(limit?: number): Promise<Outcome<UploadRecord[]>> {
    try {
      const entities = await this.dataSource.getRepository(UploadRecordEntity).find({
        order: { timestamp: 'DESC', id: 'DESC' },
        take: limit,
      });
      return ok(entities.map(toUploadRecord));
    } catch (error) {
      console.error('✗ Error reading upload history:', errorMessage(error));
      return this.failure(error);
    }
  }

  private async insertRows(manager: EntityManager, rows: QuestionRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const entities = manager.create(QuestionEntity, rows);
    await manager.save(QuestionEntity, entities, { chunk: this.insertChunk });
  }

  private failure(error: unknown): OutcomeFailure {
    return classifyFailure(error);
  }
}
