import { z } from 'zod';

export const DEFAULT_SUBJECTS = ['Computer Science', 'Mathematics', 'Physics', 'Chemistry', 'Biology'];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().trim().optional(),
  SQLITE_PATH: z.string().trim().min(1).default('./pyq-matcher.db'),
  SUBJECTS_DIR: z.string().trim().min(1).default('./data/subjects'),
  SUBJECTS_FILE: z.string().trim().min(1).default('./data/subjects.json'),
  UPLOAD_DIR: z.string().trim().min(1).default('./uploads'),
  DEFAULT_SUBJECTS: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().trim().min(1).default('text-embedding-ada-002'),
  CHAT_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
});

export interface OpenAIConfig {
  apiKey: string | undefined;
  embeddingModel: string;
  chatModel: string;
  timeoutMs: number;
}

export interface PersistenceConfig {
  /** PostgreSQL connection string; unset means no primary database. */
  databaseUrl: string | undefined;
  sqlitePath: string;
  subjectsFile: string;
  defaultSubjects: string[];
}

export interface AppConfig {
  port: number;
  persistence: PersistenceConfig;
  subjectsDir: string;
  uploadDir: string;
  openai: OpenAIConfig;
}

function parseSubjectList(raw: string | undefined): string[] {
  if (!raw) {
    return DEFAULT_SUBJECTS;
  }
  const subjects = raw
    .split(',')
    .map(subject => subject.trim())
    .filter(subject => subject.length > 0);
  return subjects.length > 0 ? subjects : DEFAULT_SUBJECTS;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    persistence: {
      databaseUrl: vars.DATABASE_URL ? vars.DATABASE_URL : undefined,
      sqlitePath: vars.SQLITE_PATH,
      subjectsFile: vars.SUBJECTS_FILE,
      defaultSubjects: parseSubjectList(vars.DEFAULT_SUBJECTS),
    },
    subjectsDir: vars.SUBJECTS_DIR,
    uploadDir: vars.UPLOAD_DIR,
    openai: {
      apiKey: vars.OPENAI_API_KEY ? vars.OPENAI_API_KEY : undefined,
      embeddingModel: vars.EMBEDDING_MODEL,
      chatModel: vars.CHAT_MODEL,
      timeoutMs: vars.OPENAI_TIMEOUT_MS,
    },
  };
}
