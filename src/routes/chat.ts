// src/routes/chat.ts
// What: /chat route: question in, cited answer out.
// How: Validates input, then RagService.chat() retrieves passages, packs them into the context budget, makes one
//      generation call and records the exchange. When the index is empty or an upstream model call fails, the
//      route still answers 200 with answered=false and a fixed apology, so chat clients never see a raw 5xx.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RagService } from '../services/ragService.js';

const schema = z.object({
  query: z.string().min(1).max(2000),
  topK: z.number().int().positive().max(100).optional(),
  documentIds: z.array(z.string().min(1)).max(100).optional(),
  maxContextTokens: z.number().int().positive().max(1_000_000).optional(),
});

export function createChatRouter(service: RagService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const { query, topK, documentIds, maxContextTokens } = parsed.data;

      const result = await service.chat(query, { topK, documentIds, maxContextTokens });
      res.json({
        answered: result.answered,
        answer: result.answer,
        citations: result.citations.map((c) => ({
          marker: c.marker,
          chunk_id: c.chunkId,
          document_id: c.documentId,
          score: c.score,
          char_start: c.charStart,
          char_end: c.charEnd,
        })),
        context_chunk_ids: result.contextChunkIds,
        conversation_id: result.conversationId,
        model_name: result.modelName,
        timestamp: result.createdAt,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
