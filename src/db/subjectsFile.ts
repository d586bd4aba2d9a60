import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from '../utils/errors';

const subjectsFileSchema = z.object({
  subjects: z.array(z.string()),
  metadata: z.record(z.unknown()).default({}),
});

export type SubjectsFile = z.infer<typeof subjectsFileSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function writeSubjectsFile(
  filePath: string,
  subjects: string[],
  metadata: Record<string, unknown>
): Promise<SubjectsFile> {
  const contents: SubjectsFile = { subjects, metadata };
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(contents, null, 2) + '\n', 'utf-8');
  return contents;
}

/**
 * Reads the fallback subject list. A missing file is regenerated with the
 * default subjects; an unreadable one yields the defaults without touching
 * the file.
 */
export async function readSubjectsFile(filePath: string, defaultSubjects: string[]): Promise<SubjectsFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) {
      console.error(`✗ Error reading ${filePath}:`, errorMessage(error));
      return { subjects: defaultSubjects, metadata: {} };
    }
    console.warn(`⚠️ ${filePath} not found, regenerating it with ${defaultSubjects.length} default subjects`);
    try {
      return await writeSubjectsFile(filePath, defaultSubjects, {
        created: 'auto-generated',
        description: 'Default subject list',
        mode: 'flat-file',
      });
    } catch (writeError) {
      console.error(`✗ Error creating ${filePath}:`, errorMessage(writeError));
      return { subjects: defaultSubjects, metadata: {} };
    }
  }

  try {
    const parsed = subjectsFileSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
    console.error(`✗ ${filePath} has an unexpected shape:`, parsed.error.issues[0]?.message);
  } catch (error) {
    console.error(`✗ ${filePath} is not valid JSON:`, errorMessage(error));
  }
  return { subjects: defaultSubjects, metadata: {} };
}
