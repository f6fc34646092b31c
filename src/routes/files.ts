// src/routes/files.ts
// What: PDFs registered by URL: POST /files/register, GET /files, POST /files/process.
// How: Registration only records the URL; POST /process downloads and ingests every pending or failed file and
//      answers with the per-file outcome once the run is over.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RegisteredFileRecord } from '../models/types.js';
import type { RagService } from '../services/ragService.js';

const registerSchema = z.object({
  files: z
    .array(
      z.object({
        filename: z.string().min(1).max(500),
        downloadUrl: z.string().url(),
        size: z.number().int().nonnegative().nullable().optional(),
        contentType: z.string().min(1).optional(),
      }),
    )
    .min(1)
    .max(100),
});

const listSchema = z.object({
  status: z.enum(['pending', 'indexed', 'failed']).optional(),
});

function fileToJson(f: RegisteredFileRecord) {
  return {
    id: f.id,
    filename: f.filename,
    download_url: f.downloadUrl,
    size: f.size,
    content_type: f.contentType,
    status: f.status,
    document_id: f.documentId,
    registered_at: f.registeredAt,
    processed_at: f.processedAt,
    error: f.error,
  };
}

export function createFilesRouter(service: RagService): Router {
  const router = Router();

  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = registerSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const files = await service.registerFiles(parsed.data.files);
      res.status(201).json({ files: files.map(fileToJson) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = listSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const files = await service.listRegisteredFiles(parsed.data.status);
      res.json({ items: files.map(fileToJson), total: files.length });
    } catch (err) {
      next(err);
    }
  });

  router.post('/process', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await service.processRegisteredFiles();
      res.json({
        processed: summary.processed,
        indexed: summary.indexed,
        failed: summary.failed,
        files: summary.files.map(fileToJson),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
