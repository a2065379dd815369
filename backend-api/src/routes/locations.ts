import { Router } from 'express';

import { listLocations } from '../services/registryService.js';
import type { TrackerSession } from '../services/session.js';

// Every path segment under /turbines is a serial number.
export function createLocationsRouter(session: TrackerSession) {
  const router = Router();

  router.get('/', (_req, res) => {
    return res.json({ ok: true, locations: listLocations(session.document) });
  });

  return router;
}
