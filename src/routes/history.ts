import express from 'express';
import { AppContext } from '../context';
import { historyQuerySchema } from '../schemas/requests';
import { isOk } from '../utils/outcome';
import { sendFailure, sendValidationError } from './respond';

export function createHistoryRouter(context: AppContext) {
  const router = express.Router();

  // Most recent uploads first
  router.get('/', async (req, res, next) => {
    try {
      const parsed = historyQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      const outcome = await context.persistence.repository.listUploadHistory(parsed.data.limit);
      if (!isOk(outcome)) {
        return sendFailure(res, outcome);
      }
      res.json({ uploads: outcome.value, count: outcome.value.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
