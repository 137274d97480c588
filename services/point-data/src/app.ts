import cors from '@fastify/cors';
import fastify, { type FastifyInstance } from 'fastify';

import { resolveArchive } from '@point-obs/point-data';

import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerHealthRoutes } from './routes/health';
import { registerPointDataRoutes } from './routes/pointData';
import { mapErrorToResponse } from './errors';
import type { AppContext } from './types';
import type { PointDataServiceConfig } from './config';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createApp = async (config: PointDataServiceConfig): Promise<CreateAppResult> => {
  const logger = createLogger(config.logLevel);
  const app = fastify({ logger });
  await app.register(cors, { origin: true });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'archive' }, 0);

  const ctx: AppContext = {
    config,
    archive: resolveArchive({ root: config.archiveRoot, databasePath: config.databasePath }),
    metrics
  };
  app.log.info({ archiveRoot: ctx.archive.root, databasePath: ctx.archive.databasePath }, 'Using point data archive');

  registerHealthRoutes(app, ctx);
  registerPointDataRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Point data request failed');
    }
    reply
      .status(mapped.statusCode)
      .send({ message: mapped.message, code: mapped.code, details: mapped.details });
  });

  return { app, ctx };
};
