import express from 'express';
import { AppContext } from '../context';
import { storeQuestionsSchema } from '../schemas/requests';
import { isOk } from '../utils/outcome';
import { sendFailure, sendValidationError } from './respond';

export function createQuestionsRouter(context: AppContext) {
  const router = express.Router();
  const { repository } = context.persistence;

  router.get('/', async (req, res, next) => {
    try {
      const subject = typeof req.query.subject === 'string' ? req.query.subject.trim() : '';
      const outcome = subject ? await repository.listQuestionsBySubject(subject) : await repository.listAllQuestions();
      if (!isOk(outcome)) {
        return sendFailure(res, outcome);
      }
      res.json({ questions: outcome.value, count: outcome.value.length });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const parsed = storeQuestionsSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      const { subject, questions } = parsed.data;
      const outcome = await repository.storeQuestions(subject, questions);
      if (!isOk(outcome)) {
        return sendFailure(res, outcome);
      }
      console.log(`✓ Stored ${outcome.value}/${questions.length} questions for ${subject}`);
      res.status(201).json({ subject, received: questions.length, stored: outcome.value });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
