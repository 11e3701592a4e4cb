import express from 'express';
import cors from 'cors';
import { errorHandler } from './middleware/error-handler.js';
import { createAskRouter } from './routes/ask.js';
import { createKnowledgeRouter } from './routes/knowledge.js';
import type { KnowledgeBase } from './services/rag/knowledge-base.js';

export interface AppOptions {
  frontendUrls?: string[];
  version?: string;
}

export function createApp(knowledgeBase: KnowledgeBase, options: AppOptions = {}): express.Express {
  const app = express();

  // CORS configuration - supports multiple origins
  const allowedOrigins = [
    'http://localhost:5173',
    'http://localhost:3000',
    ...(options.frontendUrls ?? []),
  ];

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl)
      if (!origin) {
        callback(null, true);
        return;
      }
      if (allowedOrigins.includes(origin)) {
        callback(null, origin);
      } else {
        console.warn(`CORS blocked origin: ${origin}`);
        callback(new Error('Not allowed by CORS'));
      }
    },
  }));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      index_ready: knowledgeBase.ready,
      timestamp: new Date().toISOString(),
      version: options.version ?? '1.0.0',
    });
  });

  app.use('/api/ask', createAskRouter(knowledgeBase));
  app.use('/api/knowledge', createKnowledgeRouter(knowledgeBase));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
