import { Router, type Response } from 'express';
import type { FullDictionary } from '../../dictionary/FullDictionary.js';
import { DictionaryError } from '../../errors.js';
import { resolveWordResponse, serializeWord } from '../serialize.js';

function sendError(res: Response, err: unknown) {
  if (err instanceof DictionaryError && err.code === 'NOT_ALLOCATED') {
    res.status(503).json({ ok: false, error: err.message });
    return;
  }
  res.status(500).json({ ok: false, error: err instanceof Error ? err.message : String(err) });
}

export function wordsRouter(dictionary: FullDictionary): Router {
  const router = Router();

  router.get('/words/:spelling', (req, res) => {
    try {
      const { status, body } = resolveWordResponse(dictionary, req.params.spelling);
      res.status(status).json(body);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/fillers', (_req, res) => {
    try {
      res.json({ ok: true, fillers: dictionary.getFillerWords().map(serializeWord) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/dump', (_req, res) => {
    try {
      res.type('text/plain').send(dictionary.dumpToString());
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
