import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type QueryOutcomeLabel = 'success' | 'invalid' | 'archive_error' | 'aborted' | 'error';

export interface PointDataMetrics {
  register: Registry;
  queries: Counter<'outcome'>;
  sitesLoaded: Counter<string>;
  queryDuration: Histogram<'outcome'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): PointDataMetrics => {
  const register = new Registry();

  const queries = new Counter({
    name: 'point_data_queries_total',
    help: 'Point data queries handled, by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const sitesLoaded = new Counter({
    name: 'point_data_sites_loaded_total',
    help: 'Sites whose records were returned by point data queries',
    registers: [register]
  });

  const queryDuration = new Histogram({
    name: 'point_data_query_duration_seconds',
    help: 'Wall time spent answering point data queries',
    registers: [register],
    labelNames: ['outcome'] as const,
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15, 60]
  });

  const readinessGauge = new Gauge({
    name: 'point_data_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    queries,
    sitesLoaded,
    queryDuration,
    readinessGauge
  };
};
