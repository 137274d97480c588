import assert from 'node:assert/strict';
import { test } from 'node:test';

import { createApp } from '../src/app';
import type { PointDataServiceConfig } from '../src/config';
import {
  createFixtureArchive,
  dailyCsv,
  type FixtureArchive
} from '../../../packages/point-data/tests/helpers/archive';

const makeConfig = (archiveRoot: string): PointDataServiceConfig => ({
  host: '127.0.0.1',
  port: 0,
  logLevel: 'silent',
  archiveRoot,
  loadConcurrency: 2,
  maxRecordFileBytes: 1024 * 1024
});

const streamflowQuery = {
  data_source: 'usgs_nwis',
  variable: 'streamflow',
  temporal_resolution: 'daily',
  aggregation: 'average'
};

const buildArchive = async (): Promise<FixtureArchive> => {
  const archive = await createFixtureArchive({
    sites: [
      { siteId: 'A', latitude: 42, longitude: -105, state: 'CO', doi: '10.0000/a' },
      { siteId: 'B', latitude: 50, longitude: -110, state: 'MT' }
    ],
    observations: [
      { siteId: 'A', varId: 2, first: '2020-01-01', last: '2020-01-03', recordCount: 3 },
      { siteId: 'B', varId: 2, first: '2020-01-01', last: '2020-01-02', recordCount: 2 }
    ]
  });
  await archive.writeFile('streamflow/data/daily/A.csv', dailyCsv('streamflow', '2020-01-01', [1.5, 2.5, 3.5]));
  await archive.writeFile('streamflow/data/daily/B.csv', dailyCsv('streamflow', '2020-01-01', [7, 8]));
  return archive;
};

test('reports health and archive readiness', async (t) => {
  const archive = await buildArchive();
  const { app } = await createApp(makeConfig(archive.root));
  const missing = await createApp(makeConfig('/nonexistent-archive'));
  t.after(async () => {
    await app.close();
    await missing.app.close();
    await archive.cleanup();
  });

  const health = await app.inject({ method: 'GET', url: '/healthz' });
  assert.equal(health.statusCode, 200);
  assert.deepEqual(health.json(), { status: 'ok' });

  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 200);
  assert.deepEqual(ready.json(), { status: 'ready', components: { archive: true } });

  const notReady = await missing.app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(notReady.statusCode, 503);
  assert.deepEqual(notReady.json(), { status: 'not_ready', components: { archive: false } });
});

test('lists available sources', async (t) => {
  const { app } = await createApp(makeConfig('/nonexistent-archive'));
  t.after(() => app.close());

  const response = await app.inject({ method: 'GET', url: '/sources' });
  assert.equal(response.statusCode, 200);
  const body = response.json();
  assert.equal(body.sources.length, 24);
  assert.deepEqual(body.sources[0], {
    variableName: 'streamflow',
    units: 'cms',
    dataSource: 'usgs_nwis',
    variable: 'streamflow',
    temporalResolution: 'hourly',
    aggregation: 'average',
    depthLevel: null
  });

  const text = await app.inject({ method: 'GET', url: '/sources', headers: { accept: 'text/plain' } });
  assert.equal(text.statusCode, 200);
  assert.ok(text.body.startsWith('variable_name'));
});

test('answers point data queries from snake_case parameters', async (t) => {
  const archive = await buildArchive();
  const { app } = await createApp(makeConfig(archive.root));
  t.after(async () => {
    await app.close();
    await archive.cleanup();
  });

  const response = await app.inject({
    method: 'GET',
    url: '/point-data',
    query: {
      ...streamflowQuery,
      date_start: '2020-01-02',
      latitude_range: '[40, 45]',
      return_metadata: 'true'
    }
  });

  assert.equal(response.statusCode, 200);
  const body = response.json();
  assert.deepEqual(body.observations, [
    { siteId: 'A', timestamp: '2020-01-02', value: 2.5 },
    { siteId: 'A', timestamp: '2020-01-03', value: 3.5 }
  ]);
  assert.equal(body.metadata.rows.length, 1);
  assert.equal(body.metadata.rows[0].site_id, 'A');
  assert.equal(body.metadata.rows[0].record_count, 3);

  const listed = await app.inject({
    method: 'GET',
    url: '/point-data',
    query: { ...streamflowQuery, site_ids: 'B', min_num_obs: '2' }
  });
  assert.equal(listed.statusCode, 200);
  assert.deepEqual(
    listed.json().observations.map((row: { value: number }) => row.value),
    [7, 8]
  );

  const metrics = await app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(metrics.statusCode, 200);
  assert.ok(metrics.body.includes('point_data_queries_total{outcome="success"} 2'));
  assert.ok(metrics.body.includes('point_data_sites_loaded_total 2'));
});

test('maps query failures to error responses', async (t) => {
  const archive = await createFixtureArchive({
    sites: [{ siteId: 'X', latitude: 40, longitude: -100 }],
    observations: [{ siteId: 'X', varId: 2, first: '2020-01-01', last: '2020-01-02', recordCount: 2 }]
  });
  const { app } = await createApp(makeConfig(archive.root));
  t.after(async () => {
    await app.close();
    await archive.cleanup();
  });

  const unsupported = await app.inject({
    method: 'GET',
    url: '/point-data',
    query: { ...streamflowQuery, variable: 'swe' }
  });
  assert.equal(unsupported.statusCode, 400);
  assert.equal(unsupported.json().code, 'UNSUPPORTED_COMBINATION');

  const badRange = await app.inject({
    method: 'GET',
    url: '/point-data',
    query: { ...streamflowQuery, latitude_range: 'north' }
  });
  assert.equal(badRange.statusCode, 400);
  assert.equal(badRange.json().message, 'Request validation failed');

  const reversed = await app.inject({
    method: 'GET',
    url: '/point-data',
    query: { ...streamflowQuery, latitude_range: '45,40' }
  });
  assert.equal(reversed.statusCode, 400);
  assert.equal(reversed.json().code, 'INVALID_RANGE');

  const missingFile = await app.inject({ method: 'GET', url: '/point-data', query: streamflowQuery });
  assert.equal(missingFile.statusCode, 500);
  assert.equal(missingFile.json().code, 'RECORD_FILE_MISSING');

  const metrics = await app.inject({ method: 'GET', url: '/metrics' });
  assert.ok(metrics.body.includes('point_data_queries_total{outcome="invalid"} 3'));
  assert.ok(metrics.body.includes('point_data_queries_total{outcome="archive_error"} 1'));
});

test('returns citation information with site DOIs', async (t) => {
  const archive = await buildArchive();
  const { app } = await createApp(makeConfig(archive.root));
  t.after(async () => {
    await app.close();
    await archive.cleanup();
  });

  const response = await app.inject({ method: 'GET', url: '/citations/usgs_nwis', query: { site_ids: 'A,B' } });
  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json().siteDois, [
    { siteId: 'A', doi: '10.0000/a' },
    { siteId: 'B', doi: null }
  ]);

  const unknown = await app.inject({ method: 'GET', url: '/citations/noaa' });
  assert.equal(unknown.statusCode, 400);
  assert.equal(unknown.json().code, 'UNSUPPORTED_COMBINATION');
});
