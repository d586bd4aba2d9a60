import express from 'express';
import { AppContext } from '../context';
import { createSubjectSchema } from '../schemas/requests';
import { createSubject, listSubjects } from '../services/subjectCatalog';
import { isOk } from '../utils/outcome';
import { sendFailure, sendValidationError } from './respond';

export function createSubjectsRouter(context: AppContext) {
  const router = express.Router();

  router.get('/', async (req, res, next) => {
    try {
      const listing = await listSubjects(context.persistence.repository, context.config.persistence);
      res.json({ ...listing, mode: context.persistence.mode });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const parsed = createSubjectSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      const outcome = await createSubject(context.persistence.repository, parsed.data.name);
      if (!isOk(outcome)) {
        return sendFailure(res, outcome);
      }
      res.status(outcome.value.created ? 201 : 200).json(outcome.value);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
