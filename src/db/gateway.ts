import { DataSource } from 'typeorm';
import { PersistenceConfig } from '../config/env';
import { connectDataSource, DatabaseTarget, describeTarget } from './dataSource';
import { FlatFileQuestionRepository } from './flatFileRepository';
import { RelationalQuestionRepository } from './questionRepository';
import { BackendMode, QuestionRepository } from './types';
import { errorMessage } from '../utils/errors';

export type Connector = (target: DatabaseTarget) => Promise<DataSource>;

export interface PersistenceContext {
  readonly mode: BackendMode;
  readonly repository: QuestionRepository;
  close(): Promise<void>;
}

function relationalContext(dataSource: DataSource, mode: Exclude<BackendMode, 'flat-file'>): PersistenceContext {
  return Object.freeze({
    mode,
    repository: new RelationalQuestionRepository(dataSource, mode),
    close: async () => {
      if (dataSource.isInitialized) {
        await dataSource.destroy();
      }
    },
  });
}

async function tryConnect(connect: Connector, target: DatabaseTarget): Promise<DataSource | null> {
  const label = describeTarget(target);
  try {
    const dataSource = await connect(target);
    console.log(`✓ Connected to ${label}`);
    return dataSource;
  } catch (error) {
    console.warn(`⚠️ ${label} unavailable: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Resolves the backend once per process: PostgreSQL when a URL is configured
 * and answers, else the local SQLite file, else the read-only subjects file.
 * Never throws on connectivity problems.
 */
export async function initPersistence(
  config: PersistenceConfig,
  connect: Connector = connectDataSource
): Promise<PersistenceContext> {
  if (config.databaseUrl) {
    const primary = await tryConnect(connect, { kind: 'postgres', url: config.databaseUrl });
    if (primary) {
      console.log('🔧 Database mode: primary-db');
      return relationalContext(primary, 'primary-db');
    }
  }

  const secondary = await tryConnect(connect, { kind: 'sqlite', database: config.sqlitePath });
  if (secondary) {
    console.log('🔧 Database mode: secondary-db');
    return relationalContext(secondary, 'secondary-db');
  }

  console.warn(`📁 Database mode: flat-file (subjects from ${config.subjectsFile})`);
  return Object.freeze({
    mode: 'flat-file' as const,
    repository: new FlatFileQuestionRepository(config.subjectsFile, config.defaultSubjects),
    close: async () => undefined,
  });
}
