import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      databaseUrl: undefined,
      databaseName: undefined,
      serverSelectionTimeoutMs: 5000,
    });
  });

  it('reads the environment', () => {
    expect(
      loadConfig({
        PORT: '9001',
        DATABASE_URL: 'mongodb://localhost:27017',
        DATABASE_NAME: 'vault',
        MONGO_SERVER_SELECTION_TIMEOUT_MS: '1500',
      })
    ).toEqual({
      port: 9001,
      databaseUrl: 'mongodb://localhost:27017',
      databaseName: 'vault',
      serverSelectionTimeoutMs: 1500,
    });
  });

  it('treats empty database variables as unset', () => {
    const config = loadConfig({ DATABASE_URL: '', DATABASE_NAME: '' });
    expect(config.databaseUrl).toBeUndefined();
    expect(config.databaseName).toBeUndefined();
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
  });
});
