import { z } from 'zod';

import { DEFAULT_ARCHIVE_ROOT, DEFAULT_LOAD_CONCURRENCY, DEFAULT_MAX_RECORD_FILE_BYTES } from '@point-obs/point-data';
import { hostVar, integerVar, loadEnvConfig, pathVar, portVar, stringVar, type EnvSource } from '@point-obs/shared';

export interface PointDataServiceConfig {
  host: string;
  port: number;
  logLevel: string;
  archiveRoot: string;
  /** Overrides `<archiveRoot>/point_obs.sqlite`. */
  databasePath?: string;
  loadConcurrency: number;
  maxRecordFileBytes: number;
}

const serviceEnvSchema = z.object({
  POINT_DATA_HOST: hostVar({ defaultHost: '0.0.0.0' }),
  POINT_DATA_PORT: portVar({ defaultPort: 4300 }),
  POINT_DATA_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true }),
  POINT_DATA_ARCHIVE_ROOT: pathVar({ defaultValue: DEFAULT_ARCHIVE_ROOT }),
  POINT_DATA_DATABASE_PATH: pathVar(),
  POINT_DATA_LOAD_CONCURRENCY: integerVar({ defaultValue: DEFAULT_LOAD_CONCURRENCY, min: 1, max: 256 }),
  POINT_DATA_MAX_RECORD_FILE_BYTES: integerVar({ defaultValue: DEFAULT_MAX_RECORD_FILE_BYTES, min: 1 })
});

export const loadConfig = (env?: EnvSource): PointDataServiceConfig => {
  const parsed = loadEnvConfig(serviceEnvSchema, { env, context: 'point-data-service' });
  return {
    host: parsed.POINT_DATA_HOST ?? '0.0.0.0',
    port: parsed.POINT_DATA_PORT ?? 4300,
    logLevel: parsed.POINT_DATA_LOG_LEVEL ?? 'info',
    archiveRoot: parsed.POINT_DATA_ARCHIVE_ROOT ?? DEFAULT_ARCHIVE_ROOT,
    databasePath: parsed.POINT_DATA_DATABASE_PATH,
    loadConcurrency: parsed.POINT_DATA_LOAD_CONCURRENCY ?? DEFAULT_LOAD_CONCURRENCY,
    maxRecordFileBytes: parsed.POINT_DATA_MAX_RECORD_FILE_BYTES ?? DEFAULT_MAX_RECORD_FILE_BYTES
  };
};
