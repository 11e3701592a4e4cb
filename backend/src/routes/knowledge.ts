/**
 * Knowledge Base Routes
 *
 * POST /api/knowledge/ingest   rebuild the index from the corpus directory
 * GET  /api/knowledge/stats    index readiness and compression statistics
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { KnowledgeBase } from '../services/rag/knowledge-base.js';

export function createKnowledgeRouter(knowledgeBase: KnowledgeBase): Router {
  const router = Router();

  router.post('/ingest', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const summary = await knowledgeBase.reingest();
      res.json(summary);
    } catch (err) {
      next(err);
    }
  });

  router.get('/stats', (_req: Request, res: Response): void => {
    res.json(knowledgeBase.stats());
  });

  return router;
}
