import { Router } from 'express';

import { COLLECTION_NAMES } from '@turbinetrack/shared';

import type { TrackerSession } from '../services/session.js';
import { backendVersion } from '../version.js';

export function createHealthRouter(session: TrackerSession) {
  const router = Router();

  router.get('/', (_req, res) => {
    const counts: Record<string, number> = {};
    for (const name of COLLECTION_NAMES) counts[name] = session.document[name].length;
    res.json({
      ok: true,
      version: backendVersion,
      buildDate: process.env.BUILD_DATE ?? null,
      counts,
    });
  });

  return router;
}
