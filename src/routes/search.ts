import express from 'express';
import { AppContext } from '../context';
import { searchSchema } from '../schemas/requests';
import { search } from '../services/retrieval';
import { isOk } from '../utils/outcome';
import { sendFailure, sendValidationError } from './respond';

export function createSearchRouter(context: AppContext) {
  const router = express.Router();

  router.post('/', async (req, res, next) => {
    try {
      const parsed = searchSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      const { text, subject, k } = parsed.data;
      console.log(`Search request: "${text.substring(0, 80)}" (subject: ${subject ?? 'all'}, k: ${k})`);

      const outcome = await search(context.persistence.repository, context.ai, text, { subject, k });
      if (!isOk(outcome)) {
        return sendFailure(res, outcome);
      }
      res.json({ matches: outcome.value, count: outcome.value.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
