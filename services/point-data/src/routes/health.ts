import { constants } from 'node:fs';
import { access } from 'node:fs/promises';

import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

const isReadable = async (filePath: string): Promise<boolean> => {
  try {
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
};

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const archive = await isReadable(ctx.archive.databasePath);
    ctx.metrics.readinessGauge.set({ component: 'archive' }, archive ? 1 : 0);
    const components: Record<string, boolean> = { archive };

    if (!archive) {
      request.log.warn({ databasePath: ctx.archive.databasePath }, 'Archive index database is not readable');
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
