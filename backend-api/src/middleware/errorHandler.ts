import type { NextFunction, Request, Response } from 'express';

import { isDocumentStoreError } from '@turbinetrack/store';

import { logError } from '../utils/logger.js';

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  // Body parser reports invalid JSON as a SyntaxError carrying the raw body.
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ ok: false, error: 'invalid_json', message: 'invalid json' });
  }

  const url = req.originalUrl || req.url;
  if (isDocumentStoreError(err)) {
    logError('store failure', { method: req.method, url, code: err.code, message: err.message });
    return res.status(500).json({ ok: false, error: err.code, message: err.message });
  }

  const msg = err instanceof Error ? err.message : String(err);
  logError('unhandled error', { method: req.method, url, message: msg });
  return res.status(500).json({ ok: false, error: 'internal_error', message: msg });
}
