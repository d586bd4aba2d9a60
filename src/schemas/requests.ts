import { z } from 'zod';

export const createSubjectSchema = z.object({
  name: z.string().trim().min(1, 'Subject name is required'),
});

export const questionInputSchema = z.object({
  question: z.string().nullish(),
  sub_topic: z.string().optional(),
  marks: z.number().finite().optional(),
  year: z.string().optional(),
  semester: z.string().optional(),
  branch: z.string().optional(),
  unit: z.string().optional(),
});

export const storeQuestionsSchema = z.object({
  subject: z.string().trim().min(1, 'Subject is required'),
  questions: z.array(questionInputSchema),
});

export const searchSchema = z.object({
  text: z.string().trim().min(1, 'Text is required and must be a non-empty string'),
  subject: z.string().trim().min(1).optional(),
  k: z.coerce.number().int().min(1).max(50).default(5),
});

export const processNotesSchema = z.object({
  subject: z.string().trim().min(1, 'Subject is required'),
  k: z.coerce.number().int().min(1).max(10).default(3),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export const matchChunksSchema = z.object({
  text: z.string().trim().min(1, 'Text is required and must be a non-empty string'),
  subject: z.string().trim().min(1, 'Subject is required'),
  k: z.coerce.number().int().min(1).max(10).default(3),
  maxSentences: z.coerce.number().int().min(1).max(50).default(5),
});
