import assert from 'node:assert/strict';
import { test } from 'node:test';

import { EnvConfigError } from '@point-obs/shared';

import { loadConfig } from '../src/config';

test('falls back to defaults for an empty environment', () => {
  assert.deepEqual(loadConfig({}), {
    host: '0.0.0.0',
    port: 4300,
    logLevel: 'info',
    archiveRoot: '/hydrodata/national_obs',
    databasePath: undefined,
    loadConcurrency: 8,
    maxRecordFileBytes: 268435456
  });
});

test('reads overrides from the environment', () => {
  const config = loadConfig({
    POINT_DATA_PORT: '8080',
    POINT_DATA_LOG_LEVEL: 'DEBUG',
    POINT_DATA_ARCHIVE_ROOT: '/data/obs',
    POINT_DATA_DATABASE_PATH: '/data/index/point_obs.sqlite',
    POINT_DATA_LOAD_CONCURRENCY: '2'
  });
  assert.equal(config.port, 8080);
  assert.equal(config.logLevel, 'debug');
  assert.equal(config.archiveRoot, '/data/obs');
  assert.equal(config.databasePath, '/data/index/point_obs.sqlite');
  assert.equal(config.loadConcurrency, 2);
});

test('rejects invalid values', () => {
  assert.throws(() => loadConfig({ POINT_DATA_LOAD_CONCURRENCY: '0' }), EnvConfigError);
  assert.throws(() => loadConfig({ POINT_DATA_PORT: 'http' }), EnvConfigError);
});
