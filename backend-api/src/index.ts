import { isDocumentStoreError, JsonFileDocumentStore } from '@turbinetrack/store';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openSession, type TrackerSession } from './services/session.js';
import { logError, logInfo } from './utils/logger.js';

function openFileSession(dataFile: string): TrackerSession | null {
  try {
    return openSession(new JsonFileDocumentStore(dataFile));
  } catch (e) {
    if (!isDocumentStoreError(e)) throw e;
    // A corrupt file is left as is for the operator to inspect; nothing is reinitialized.
    logError('[backend-api] cannot open data file', { dataFile, code: e.code, message: e.message });
    return null;
  }
}

function bootstrap() {
  const config = loadConfig();
  const session = openFileSession(config.dataFile);
  if (!session) {
    process.exitCode = 1;
    return;
  }

  const app = createApp(session);
  app.listen(config.port, config.host, () => {
    logInfo(`[backend-api] listening on ${config.host}:${config.port}`, { dataFile: config.dataFile }, { critical: true });
  });
}

bootstrap();
