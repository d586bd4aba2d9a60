#!/usr/bin/env node
import 'reflect-metadata';
import dotenv from 'dotenv';
import { loadConfig } from './config/env';
import { initPersistence } from './db/gateway';
import { loadCorpus } from './services/corpusLoader';
import { errorMessage } from './utils/errors';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const persistence = await initPersistence(config.persistence);

  try {
    const summary = await loadCorpus(persistence.repository, {
      subjectsDir: config.subjectsDir,
      subjectsFile: config.persistence.subjectsFile,
    });

    for (const result of summary.subjects) {
      const status = result.error ? `✗ ${result.error}` : `${result.stored} questions`;
      console.log(`  ${result.subject} (${result.file}): ${status}`);
    }
    if (summary.mode === 'flat-file') {
      console.log('📁 No database reachable: only the subjects file was updated.');
    } else {
      console.log(`🎉 Loaded ${summary.totalStored} questions across ${summary.subjects.length} subjects (${summary.mode})`);
    }
  } finally {
    await persistence.close();
  }
}

main().catch(error => {
  console.error('Corpus load failed:', errorMessage(error));
  process.exit(1);
});
