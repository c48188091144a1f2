import { Router } from 'express';
import type { FullDictionary } from '../../dictionary/FullDictionary.js';

const startedAt = Date.now();

export function healthRouter(dictionary: FullDictionary): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const allocated = dictionary.isAllocated();
    res.json({
      ok: allocated,
      version: process.env.APP_VERSION ?? 'dev',
      node: process.version,
      state: allocated ? 'loaded' : 'unloaded',
      wordDictionary: dictionary.getWordDictionaryFile().href,
      fillerDictionary: dictionary.getFillerDictionaryFile().href,
      words: allocated ? dictionary.getWordCount() : 0,
      fillers: allocated ? dictionary.getFillerCount() : 0,
      loadTimeMs: allocated ? Math.round(dictionary.getLoadTimeMs()) : null,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return router;
}
