import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import {
  formatAvailableSources,
  getCitationInformation,
  listAvailableSources,
  observationOrderSchema,
  runPointDataQuery,
  type PointDataQueryInput
} from '@point-obs/point-data';
import { booleanVar, integerVar, numberRangeVar, stringListVar, stringVar } from '@point-obs/shared';

import type { AppContext } from '../types';
import { outcomeForError } from '../errors';

const BRACKETS_AND_QUOTES = /^[[\s'"]+|[\]\s'"]+$/g;

// Accepts `a,b`, `[a, b]` and repeated query keys.
const listParam = () =>
  stringListVar({ unique: true }).transform((entries) => {
    const cleaned = entries
      .map((entry) => entry.replace(BRACKETS_AND_QUOTES, ''))
      .filter((entry) => entry.length > 0);
    return cleaned.length > 0 ? cleaned : undefined;
  });

const pointDataQuerystringSchema = z.object({
  data_source: z.string().trim().min(1),
  variable: z.string().trim().min(1),
  temporal_resolution: z.string().trim().min(1),
  aggregation: z.string().trim().min(1),
  depth_level: integerVar(),
  date_start: stringVar(),
  date_end: stringVar(),
  latitude_range: numberRangeVar(),
  longitude_range: numberRangeVar(),
  site_ids: listParam(),
  state: listParam(),
  site_networks: listParam(),
  min_num_obs: integerVar(),
  return_metadata: booleanVar({ defaultValue: false }),
  all_attributes: booleanVar({ defaultValue: false }),
  order: observationOrderSchema.optional()
});

type PointDataQuerystring = z.infer<typeof pointDataQuerystringSchema>;

const toQueryInput = (query: PointDataQuerystring): PointDataQueryInput => ({
  dataSource: query.data_source,
  variable: query.variable,
  temporalResolution: query.temporal_resolution,
  aggregation: query.aggregation,
  depthLevel: query.depth_level,
  dateStart: query.date_start,
  dateEnd: query.date_end,
  latitudeRange: query.latitude_range,
  longitudeRange: query.longitude_range,
  siteIds: query.site_ids,
  state: query.state,
  siteNetworks: query.site_networks,
  minNumObs: query.min_num_obs,
  returnMetadata: query.return_metadata,
  allAttributes: query.all_attributes,
  order: query.order
});

const citationParamsSchema = z.object({ dataSource: z.string().trim().min(1) });
const citationQuerystringSchema = z.object({ site_ids: listParam() });

export const registerPointDataRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/sources', async (request, reply) => {
    const sources = listAvailableSources();
    if (request.headers.accept?.includes('text/plain')) {
      return reply.type('text/plain; charset=utf-8').send(`${formatAvailableSources(sources)}\n`);
    }
    return { sources };
  });

  app.get('/citations/:dataSource', async (request) => {
    const { dataSource } = citationParamsSchema.parse(request.params);
    const { site_ids: siteIds } = citationQuerystringSchema.parse(request.query);
    return getCitationInformation(dataSource, { siteIds, archive: ctx.archive });
  });

  app.get('/point-data', async (request, reply) => {
    const stopTimer = ctx.metrics.queryDuration.startTimer();
    const controller = new AbortController();
    const abortOnDisconnect = () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    };
    reply.raw.once('close', abortOnDisconnect);

    try {
      const querystring = pointDataQuerystringSchema.parse(request.query);
      const { result, stats } = await runPointDataQuery(toQueryInput(querystring), {
        archive: ctx.archive,
        logger: request.log,
        signal: controller.signal,
        loadConcurrency: ctx.config.loadConcurrency,
        maxRecordFileBytes: ctx.config.maxRecordFileBytes
      });

      ctx.metrics.queries.inc({ outcome: 'success' });
      ctx.metrics.sitesLoaded.inc(stats.loadedSites);
      stopTimer({ outcome: 'success' });
      return result;
    } catch (error) {
      const outcome = outcomeForError(error);
      ctx.metrics.queries.inc({ outcome });
      stopTimer({ outcome });
      throw error;
    } finally {
      reply.raw.off('close', abortOnDisconnect);
    }
  });
};
