import 'reflect-metadata';
import dotenv from 'dotenv';
import { loadConfig } from './config/env';
import { initPersistence } from './db/gateway';
import { createApp } from './app';
import { seedDefaultSubjects } from './services/subjectCatalog';
import { OpenAIProvider } from './utils/openaiService';
import { errorMessage } from './utils/errors';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const persistence = await initPersistence(config.persistence);

  const seeded = await seedDefaultSubjects(persistence.repository, config.persistence.defaultSubjects);
  if (seeded.length > 0) {
    console.log(`✓ Seeded ${seeded.length} default subjects`);
  }

  const app = createApp({ config, persistence, ai: new OpenAIProvider(config.openai) });

  const server = app.listen(config.port, '0.0.0.0', () => {
    console.log(`Server is running on port ${config.port} (${persistence.mode})`);
    console.log(`Health check: http://localhost:${config.port}/api/health`);
  });

  const shutdown = () => {
    server.close(() => {
      persistence.close().then(
        () => process.exit(0),
        error => {
          console.error('Error closing database:', errorMessage(error));
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(error => {
  console.error('Failed to start server:', errorMessage(error));
  process.exit(1);
});
