// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health, GET /index/stats and POST /index/persist, and mounts /documents, /search, /chat,
//      /conversations and /files.
//      Every sub-router is built from the shared RagService.

import { Router, Request, Response, NextFunction } from 'express';
import type { RagService } from '../services/ragService.js';
import { createDocumentsRouter } from './documents.js';
import { createSearchRouter } from './search.js';
import { createChatRouter } from './chat.js';
import { createConversationsRouter } from './conversations.js';
import { createFilesRouter } from './files.js';

export function createRouter(service: RagService): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.get('/index/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await service.indexStats();
      res.json({
        entry_count: stats.entryCount,
        dimension: stats.dimension,
        document_count: stats.documentCount,
        approximate: stats.approximate,
        on_disk_bytes: stats.onDiskBytes,
      });
    } catch (err) {
      next(err);
    }
  });

  router.post('/index/persist', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const bytes = await service.persistIndex();
      res.json({ persisted: true, bytes });
    } catch (err) {
      next(err);
    }
  });

  router.use('/documents', createDocumentsRouter(service));
  router.use('/search', createSearchRouter(service));
  router.use('/chat', createChatRouter(service));
  router.use('/conversations', createConversationsRouter(service));
  router.use('/files', createFilesRouter(service));

  return router;
}
