import { createRequire } from 'node:module';

// package.json is read through createRequire: plain ESM JSON imports need import attributes.
const require = createRequire(import.meta.url);

function readVersion(): string {
  const raw: unknown = require('../package.json');
  if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') return raw.version;
  return '0.0.0';
}

export const backendVersion = readVersion();
