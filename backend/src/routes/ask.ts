/**
 * Question Answering Route
 *
 * POST /api/ask
 * Answers a question from the indexed documents and cites the sources used.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { KnowledgeBase } from '../services/rag/knowledge-base.js';

export function createAskRouter(knowledgeBase: KnowledgeBase): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    // ── Validate input ──────────────────────────────────────────────────
    const { question, k } = req.body ?? {};

    if (typeof question !== 'string') {
      res.status(400).json({ error: 'question is required and must be a string' });
      return;
    }

    if (k !== undefined && (typeof k !== 'number' || !Number.isInteger(k) || k <= 0 || k > 50)) {
      res.status(400).json({ error: 'k must be an integer between 1 and 50' });
      return;
    }

    try {
      const answer = await knowledgeBase.ask(question, { k });
      res.json(answer);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
