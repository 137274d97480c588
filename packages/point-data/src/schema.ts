import { z } from 'zod';

import { QueryValidationError } from './errors';
import { toEpochMillis } from './timestamps';

const dateBoundSchema = z
  .string()
  .trim()
  .refine((value) => toEpochMillis(value) !== null, {
    message: "Expected a 'YYYY-MM-DD' date or an ISO-8601 date-time"
  });

const rangeSchema = z.tuple([z.number().finite(), z.number().finite()]);

const stateSchema = z
  .union([z.string().trim().min(1), z.array(z.string().trim().min(1))])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const observationOrderSchema = z.enum(['site', 'chronological']);

export const pointDataQuerySchema = z.object({
  dataSource: z.string().trim().min(1),
  variable: z.string().trim().min(1),
  temporalResolution: z.string().trim().min(1),
  aggregation: z.string().trim().min(1),
  depthLevel: z.number().int().nullable().optional(),
  dateStart: dateBoundSchema.optional(),
  dateEnd: dateBoundSchema.optional(),
  latitudeRange: rangeSchema.optional(),
  longitudeRange: rangeSchema.optional(),
  siteIds: z.array(z.string().trim().min(1)).optional(),
  state: stateSchema.optional(),
  siteNetworks: z.array(z.string().trim().min(1)).optional(),
  minNumObs: z.number().int().min(1, 'minNumObs must be at least 1').default(1),
  returnMetadata: z.boolean().default(false),
  allAttributes: z.boolean().default(false),
  order: observationOrderSchema.default('site')
});

export type PointDataQueryInput = z.input<typeof pointDataQuerySchema>;
export type PointDataQuery = Readonly<z.output<typeof pointDataQuerySchema>>;
export type ObservationOrder = z.infer<typeof observationOrderSchema>;
export type Range = readonly [number, number];

export function parsePointDataQuery(input: unknown): PointDataQuery {
  const result = pointDataQuerySchema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new QueryValidationError(`Invalid point data query (${summary})`, result.error.flatten());
  }
  return Object.freeze(result.data);
}

export type SiteAttributeValue = string | number | null;

export interface SiteRecord {
  siteId: string;
  siteName: string | null;
  siteType: string | null;
  agency: string | null;
  state: string | null;
  latitude: number | null;
  longitude: number | null;
  varId: number;
  firstDateDataAvailable: string | null;
  lastDateDataAvailable: string | null;
  /** Lifetime record count from the index; never reflects query filters. */
  recordCount: number;
  filePath: string | null;
  /** Every other column the site index carries, keyed by its archive name. */
  attributes: Record<string, SiteAttributeValue>;
}

export interface ObservationRecord {
  siteId: string;
  timestamp: string;
  value: number;
  extras?: Record<string, string | null>;
}

export type MetadataRow = Record<string, SiteAttributeValue>;

export interface MetadataTable {
  columns: string[];
  rows: MetadataRow[];
}

export interface PointDataResult {
  observations: ObservationRecord[];
  metadata: MetadataTable | null;
}
