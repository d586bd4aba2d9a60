import express from 'express';
import cors from 'cors';
import { MulterError } from 'multer';
import { AppContext } from './context';
import { createSubjectsRouter } from './routes/subjects';
import { createQuestionsRouter } from './routes/questions';
import { createSearchRouter } from './routes/search';
import { createUploadRouter } from './routes/upload';
import { createHistoryRouter } from './routes/history';
import { errorMessage, UnsupportedUploadError } from './utils/errors';

export function createApp(context: AppContext) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging middleware
  app.use((req, res, next) => {
    if (req.path.startsWith('/api/notes')) {
      console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    }
    next();
  });

  // Routes
  app.use('/api/subjects', createSubjectsRouter(context));
  app.use('/api/questions', createQuestionsRouter(context));
  app.use('/api/search', createSearchRouter(context));
  app.use('/api/notes', createUploadRouter(context));
  app.use('/api/history', createHistoryRouter(context));

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', mode: context.persistence.mode });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    // Rejected uploads (size, type) are the client's to fix
    if (err instanceof MulterError || err instanceof UnsupportedUploadError) {
      return res.status(400).json({ error: errorMessage(err) });
    }
    console.error('Unhandled error:', err);
    res.status(500).json({
      error: errorMessage(err) || 'Internal server error',
      details: process.env.NODE_ENV === 'development' && err instanceof Error ? err.stack : undefined,
    });
  });

  return app;
}
