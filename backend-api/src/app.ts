import express from 'express';
import cors from 'cors';

import { createHealthRouter } from './routes/health.js';
import { createLocationsRouter } from './routes/locations.js';
import { createPartsRouter } from './routes/parts.js';
import { createTurbinesRouter } from './routes/turbines.js';
import type { TrackerSession } from './services/session.js';
import { errorHandler } from './middleware/errorHandler.js';

export function createApp(session: TrackerSession) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/health', createHealthRouter(session));
  app.use('/turbines', createTurbinesRouter(session));
  app.use('/locations', createLocationsRouter(session));
  app.use('/parts', createPartsRouter(session));

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
