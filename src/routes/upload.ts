import express from 'express';
import multer from 'multer';
import path from 'path';
import fs from 'fs/promises';
import { AppContext } from '../context';
import { matchChunksSchema, processNotesSchema } from '../schemas/requests';
import { matchNoteChunks } from '../services/chunkMatcher';
import { processNotes } from '../services/notesProcessor';
import { extractPages, getFileExtension } from '../utils/documentProcessor';
import { errorMessage, UnreadableDocumentError, UnsupportedUploadError } from '../utils/errors';
import { sendValidationError } from './respond';

const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

async function removeUpload(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (unlinkError) {
    console.error('Error deleting uploaded file:', errorMessage(unlinkError));
  }
}

export function createUploadRouter(context: AppContext) {
  const router = express.Router();
  const uploadDir = context.config.uploadDir;

  const storage = multer.diskStorage({
    destination: (req, file, cb) => {
      fs.mkdir(uploadDir, { recursive: true }).then(
        () => cb(null, uploadDir),
        (error: Error) => cb(error, uploadDir)
      );
    },
    filename: (req, file, cb) => {
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
      cb(null, uniqueSuffix + '-' + path.basename(file.originalname));
    },
  });

  const upload = multer({
    storage,
    limits: { fileSize: MAX_FILE_SIZE },
    fileFilter: (req, file, cb) => {
      if (getFileExtension(file.originalname) === '.pdf') {
        cb(null, true);
      } else {
        cb(new UnsupportedUploadError('Only PDF notes are supported'));
      }
    },
  });

  // Match previous-year questions against uploaded notes and locate answers
  router.post('/process', upload.single('notes'), async (req, res, next) => {
    const requestId = Date.now();
    const file = req.file;
    if (!file) {
      return res.status(400).json({ error: 'No notes PDF uploaded' });
    }

    try {
      const parsed = processNotesSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }
      const { subject, k } = parsed.data;
      console.log(`[${requestId}] Processing ${file.originalname} (${(file.size / 1024 / 1024).toFixed(2)} MB) for ${subject}`);

      const pages = await extractPages(file.path);
      if (pages.length === 0) {
        return res.status(400).json({ error: 'Could not extract any pages from the PDF' });
      }

      const result = await processNotes({
        repository: context.persistence.repository,
        ai: context.ai,
        pages,
        subject,
        filename: file.originalname,
        k,
        requestId,
      });
      res.json(result);
    } catch (error) {
      if (error instanceof UnreadableDocumentError) {
        console.warn(`[${requestId}] ${error.message}`);
        return res.status(400).json({ error: error.message });
      }
      next(error);
    } finally {
      await removeUpload(file.path);
    }
  });

  // Match questions against pasted notes text, a few sentences at a time
  router.post('/chunks', async (req, res, next) => {
    try {
      const parsed = matchChunksSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }
      const { text, subject, k, maxSentences } = parsed.data;

      const chunks = await matchNoteChunks({
        repository: context.persistence.repository,
        ai: context.ai,
        text,
        subject,
        k,
        maxSentences,
      });
      console.log(`✓ Matched ${chunks.length} chunks for ${subject}`);
      res.json({ subject, totalChunks: chunks.length, chunks });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
