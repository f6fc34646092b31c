/**
 * src/routes/documents.ts
 * What: /documents routes to list, ingest, upload and delete documents.
 * How:
 *  - GET /documents: active documents, newest first.
 *  - GET /documents/:id: one document or 404.
 *  - POST /documents: JSON { id?, filename, text }; ingests already-extracted text. Without an id a uuid is used.
 *  - POST /documents/upload: multipart PDF via multer memory storage; duplicate bytes answer already_exists.
 *  - DELETE /documents/:id: removes vectors first, then the metadata. 404 when nothing was active.
 */
import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { DocumentRecord } from '../models/types.js';
import type { RagService } from '../services/ragService.js';

const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

const ingestSchema = z.object({
  id: z.string().trim().min(1).max(200).optional(),
  filename: z.string().min(1).max(255),
  text: z.string(),
  pageCount: z.number().int().nonnegative().optional(),
});

class UnsupportedFileTypeError extends Error {
  constructor() {
    super('Only PDF files are allowed');
    this.name = 'UnsupportedFileTypeError';
  }
}

// Memory storage: the PDF is hashed and parsed from the buffer, never written to disk.
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES },
  fileFilter: (_req, file, cb) => {
    const isPdf = file.mimetype === 'application/pdf' || file.originalname.toLowerCase().endsWith('.pdf');
    if (isPdf) {
      cb(null, true);
    } else {
      cb(new UnsupportedFileTypeError());
    }
  },
});

export function toDocumentJson(d: DocumentRecord) {
  return {
    id: d.id,
    filename: d.filename,
    ingested_at: d.ingestedAt,
    page_count: d.pageCount,
    chunk_count: d.chunkCount,
  };
}

export function createDocumentsRouter(service: RagService): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await service.listDocuments();
      res.json({ items: items.map(toDocumentJson), total: items.length });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const doc = await service.getDocument(String(req.params.id));
      if (!doc || doc.deleted) {
        res.status(404).json({ error: { message: 'document_not_found' } });
        return;
      }
      res.json(toDocumentJson(doc));
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = ingestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const { id, filename, text, pageCount } = parsed.data;
      const doc = await service.ingest(id ?? `doc-${uuidv4()}`, text, { filename, pageCount });
      res.status(201).json(toDocumentJson(doc));
    } catch (err) {
      next(err);
    }
  });

  router.post('/upload', (req: Request, res: Response, next: NextFunction) => {
    upload.single('file')(req, res, (uploadErr: unknown) => {
      if (uploadErr instanceof multer.MulterError && uploadErr.code === 'LIMIT_FILE_SIZE') {
        res.status(413).json({
          success: false,
          error: `File too large. Maximum size is ${MAX_UPLOAD_BYTES / (1024 * 1024)}MB.`,
        });
        return;
      }
      if (uploadErr instanceof UnsupportedFileTypeError) {
        res.status(415).json({ success: false, error: uploadErr.message });
        return;
      }
      if (uploadErr) {
        next(uploadErr);
        return;
      }
      if (!req.file) {
        res.status(400).json({ success: false, error: 'No file provided' });
        return;
      }

      const { buffer, originalname } = req.file;
      service
        .ingestPdf(buffer, originalname)
        .then((result) => {
          // 422: the file arrived but could not be processed.
          res.status(result.success ? 200 : 422).json(result);
        })
        .catch(next);
    });
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      const deleted = await service.deleteDocument(id);
      if (!deleted) {
        res.status(404).json({ error: { message: 'document_not_found' } });
        return;
      }
      res.json({ id, deleted: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
