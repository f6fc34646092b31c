// src/routes/search.ts
// What: /search route for semantic search over indexed chunks.
// How: Validates input with zod and delegates to RagService.retrieve(). Matches come back ordered by
//      descending cosine similarity, each with its chunk text and source offsets.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RetrievedChunk } from '../models/types.js';
import type { RagService } from '../services/ragService.js';

const schema = z.object({
  // Cap query length to avoid oversized embedding requests
  query: z.string().min(1).max(2000),
  topK: z.number().int().positive().max(100).optional(),
  documentIds: z.array(z.string().min(1)).max(100).optional(),
});

export function toMatchJson(r: RetrievedChunk) {
  return {
    chunk_id: r.chunk.id,
    document_id: r.chunk.documentId,
    ordinal: r.chunk.ordinal,
    char_start: r.chunk.charStart,
    char_end: r.chunk.charEnd,
    score: r.score,
    content: r.chunk.text,
  };
}

export function createSearchRouter(service: RagService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const { query: q, topK, documentIds } = parsed.data;
      const matches = await service.retrieve(q, { topK, documentIds });
      res.json({ query: q, topK: topK ?? null, matches: matches.map(toMatchJson) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
