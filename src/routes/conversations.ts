// src/routes/conversations.ts
// What: GET /conversations, the recorded chat exchanges, newest first.
// How: page and limit come from the query string (page is 1-based, limit at most 100).

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RagService } from '../services/ragService.js';

const querySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(100).default(10),
});

export function createConversationsRouter(service: RagService): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = querySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const { page, limit } = parsed.data;
      const result = await service.listConversations(page, limit);
      res.json({
        items: result.items.map((c) => ({
          id: c.id,
          question: c.question,
          answer: c.answer,
          answered: c.answered,
          cited_chunk_ids: c.citedChunkIds,
          model_name: c.modelName,
          timestamp: c.createdAt,
        })),
        total: result.total,
        page: result.page,
        limit: result.limit,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
