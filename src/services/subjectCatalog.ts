import { PersistenceConfig } from '../config/env';
import { readSubjectsFile } from '../db/subjectsFile';
import { CreateSubjectResult, QuestionRepository } from '../db/types';
import { isOk, Outcome } from '../utils/outcome';
import { errorMessage } from '../utils/errors';

export type SubjectSource = 'database' | 'subjects-file' | 'defaults';

export interface SubjectListing {
  subjects: string[];
  source: SubjectSource;
}

type CatalogConfig = Pick<PersistenceConfig, 'subjectsFile' | 'defaultSubjects'>;

/**
 * Subjects to offer for matching. Falls back from the database to the
 * subjects file to the configured defaults; never rejects.
 */
export async function listSubjects(repository: QuestionRepository, config: CatalogConfig): Promise<SubjectListing> {
  try {
    const fromRepository = await repository.listSubjects();
    if (isOk(fromRepository) && fromRepository.value.length > 0) {
      return {
        subjects: fromRepository.value,
        source: repository.mode === 'flat-file' ? 'subjects-file' : 'database',
      };
    }
    if (!isOk(fromRepository)) {
      console.warn(`⚠️ Subject query failed (${fromRepository.error}), using ${config.subjectsFile}`);
    }

    const file = await readSubjectsFile(config.subjectsFile, config.defaultSubjects);
    if (file.subjects.length > 0) {
      return { subjects: file.subjects, source: 'subjects-file' };
    }
  } catch (error) {
    console.error('✗ Error listing subjects:', errorMessage(error));
  }
  return { subjects: [...config.defaultSubjects], source: 'defaults' };
}

export function createSubject(repository: QuestionRepository, name: string): Promise<Outcome<CreateSubjectResult>> {
  return repository.createSubject(name);
}

/** Registers each default subject when the database holds no subjects yet. */
export async function seedDefaultSubjects(repository: QuestionRepository, defaults: string[]): Promise<string[]> {
  if (repository.mode === 'flat-file') {
    return [];
  }
  const existing = await repository.listSubjects();
  if (!isOk(existing) || existing.value.length > 0) {
    return [];
  }

  const created: string[] = [];
  for (const subject of defaults) {
    const outcome = await repository.createSubject(subject);
    if (isOk(outcome) && outcome.value.created) {
      created.push(outcome.value.subject);
    }
  }
  return created;
}
