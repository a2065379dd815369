import { describe, expect, it } from 'vitest';

import { loadConfig } from '../config.js';
import { formatLine } from '../utils/logger.js';

describe('config', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ dataFile: 'data.json', port: 3001, host: '127.0.0.1' });
  });

  it('reads overrides from the environment', () => {
    expect(loadConfig({ TURBINETRACK_DATA_FILE: '/var/lib/turbines.json', PORT: '8080', HOST: '0.0.0.0' })).toEqual({
      dataFile: '/var/lib/turbines.json',
      port: 8080,
      host: '0.0.0.0',
    });
  });

  it('ignores a port that is not a positive integer', () => {
    expect(loadConfig({ PORT: 'abc' }).port).toBe(3001);
  });
});

describe('logger', () => {
  it('formats level, message and meta on one line', () => {
    const line = formatLine('warn', 'installPart rejected', { error: 'already_installed' });
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] installPart rejected \{"error":"already_installed"\}$/);
  });

  it('omits empty meta', () => {
    expect(formatLine('info', 'ready', {}).endsWith('[INFO] ready')).toBe(true);
  });
});
