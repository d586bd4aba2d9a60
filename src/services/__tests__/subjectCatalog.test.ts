import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createSubject, listSubjects, seedDefaultSubjects } from '../subjectCatalog';
import { FlatFileQuestionRepository } from '../../db/flatFileRepository';
import { writeSubjectsFile } from '../../db/subjectsFile';
import { connectivityError, Outcome } from '../../utils/outcome';
import { InMemoryQuestionRepository, silenceConsole } from './fakes';

const DEFAULTS = ['Mathematics', 'Physics'];

class UnreachableRepository extends InMemoryQuestionRepository {
  async listSubjects(): Promise<Outcome<string[]>> {
    return connectivityError('connection refused');
  }
}

describe('subjectCatalog', () => {
  let dir: string;
  let subjectsFile: string;

  beforeEach(async () => {
    silenceConsole();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-'));
    subjectsFile = path.join(dir, 'subjects.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('listSubjects', () => {
    it('prefers subjects stored in the database', async () => {
      const repository = new InMemoryQuestionRepository();
      await repository.storeQuestions('Cyber Security', [{ question: 'What is a firewall?' }]);

      await expect(listSubjects(repository, { subjectsFile, defaultSubjects: DEFAULTS })).resolves.toEqual({
        subjects: ['Cyber Security'],
        source: 'database',
      });
    });

    it('uses the subjects file when the database has no subjects', async () => {
      await writeSubjectsFile(subjectsFile, ['Chemistry'], {});

      await expect(
        listSubjects(new InMemoryQuestionRepository(), { subjectsFile, defaultSubjects: DEFAULTS })
      ).resolves.toEqual({ subjects: ['Chemistry'], source: 'subjects-file' });
    });

    it('uses the subjects file when the database is unreachable', async () => {
      await writeSubjectsFile(subjectsFile, ['Chemistry'], {});

      await expect(
        listSubjects(new UnreachableRepository(), { subjectsFile, defaultSubjects: DEFAULTS })
      ).resolves.toEqual({ subjects: ['Chemistry'], source: 'subjects-file' });
    });

    it('reports flat-file subjects as coming from the subjects file', async () => {
      await writeSubjectsFile(subjectsFile, ['Biology'], {});
      const repository = new FlatFileQuestionRepository(subjectsFile, DEFAULTS);

      await expect(listSubjects(repository, { subjectsFile, defaultSubjects: DEFAULTS })).resolves.toEqual({
        subjects: ['Biology'],
        source: 'subjects-file',
      });
    });

    it('falls back to the defaults when the subjects file lists nothing', async () => {
      await writeSubjectsFile(subjectsFile, [], {});

      await expect(
        listSubjects(new InMemoryQuestionRepository(), { subjectsFile, defaultSubjects: DEFAULTS })
      ).resolves.toEqual({ subjects: DEFAULTS, source: 'defaults' });
    });
  });

  describe('createSubject', () => {
    it('reports whether the subject was new', async () => {
      const repository = new InMemoryQuestionRepository();

      expect(await createSubject(repository, 'Networks')).toEqual({
        status: 'ok',
        value: { subject: 'Networks', created: true },
      });
      expect(await createSubject(repository, ' Networks ')).toEqual({
        status: 'ok',
        value: { subject: 'Networks', created: false },
      });
    });
  });

  describe('seedDefaultSubjects', () => {
    it('creates every default subject in an empty database', async () => {
      const repository = new InMemoryQuestionRepository();

      await expect(seedDefaultSubjects(repository, DEFAULTS)).resolves.toEqual(DEFAULTS);
      expect(await repository.listSubjects()).toEqual({ status: 'ok', value: DEFAULTS });
    });

    it('leaves a populated database alone', async () => {
      const repository = new InMemoryQuestionRepository();
      await repository.storeQuestions('Cyber Security', [{ question: 'What is a firewall?' }]);

      await expect(seedDefaultSubjects(repository, DEFAULTS)).resolves.toEqual([]);
    });

    it('does nothing in flat-file mode', async () => {
      const repository = new FlatFileQuestionRepository(subjectsFile, DEFAULTS);

      await expect(seedDefaultSubjects(repository, DEFAULTS)).resolves.toEqual([]);
    });
  });
});
