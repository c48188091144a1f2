import express from 'express';
import cors from 'cors';
import type { FullDictionary } from '../dictionary/FullDictionary.js';
import { healthRouter } from './routes/health.js';
import { wordsRouter } from './routes/words.js';
import { requireAuth } from './middleware/auth.js';

export function createApp(dictionary: FullDictionary) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // API Routes (auth-gated when AUTH_TOKEN is set)
  app.use('/api/health', healthRouter(dictionary));
  app.use('/api', requireAuth, wordsRouter(dictionary));

  return app;
}
