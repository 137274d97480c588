import assert from 'node:assert/strict';
import { test } from 'node:test';

import { InvalidRangeError, filterSites, type SiteFilterCriteria, type SiteRecord } from '../src';
import { makeSite } from './helpers/archive';

const sites: SiteRecord[] = [
  makeSite({ siteId: 'A', latitude: 42, longitude: -105, state: 'CO' }),
  makeSite({ siteId: 'B', latitude: 50, longitude: -110, state: 'MT' }),
  makeSite({ siteId: 'C', latitude: 44.5, longitude: -120, state: 'or' }),
  makeSite({ siteId: 'D', latitude: null, longitude: null, state: null }),
  makeSite({
    siteId: 'E',
    latitude: 40,
    longitude: -104,
    state: 'CO',
    firstDateDataAvailable: '2021-01-01',
    lastDateDataAvailable: '2022-06-30'
  })
];

const ids = (records: SiteRecord[]) => records.map((site) => site.siteId);

test('keeps sites inside the latitude range', () => {
  assert.deepEqual(ids(filterSites(sites, { latitudeRange: [40, 45] })), ['A', 'C', 'E']);
});

test('treats range bounds as closed and filters one dimension at a time', () => {
  assert.deepEqual(ids(filterSites(sites, { latitudeRange: [42, 42] })), ['A']);
  assert.deepEqual(ids(filterSites(sites, { longitudeRange: [-110, -104] })), ['A', 'B', 'E']);
});

test('drops unknown site ids without failing', () => {
  assert.deepEqual(ids(filterSites(sites, { siteIds: ['B', 'missing'] })), ['B']);
  assert.deepEqual(filterSites(sites, { siteIds: ['missing'] }), []);
});

test('matches state codes case-insensitively', () => {
  assert.deepEqual(ids(filterSites(sites, { state: ['co'] })), ['A', 'E']);
  assert.deepEqual(ids(filterSites(sites, { state: ['OR', 'mt'] })), ['B', 'C']);
});

test('restricts to network members', () => {
  assert.deepEqual(ids(filterSites(sites, { networkSiteIds: new Set(['C', 'E', 'Z']) })), ['C', 'E']);
});

test('drops sites whose availability misses the date window', () => {
  assert.deepEqual(ids(filterSites(sites, { dateEnd: '2020-12-31' })), ['A', 'B', 'C', 'D']);
  assert.deepEqual(ids(filterSites(sites, { dateStart: '2021-01-01' })), ['E']);
  assert.deepEqual(ids(filterSites(sites, { dateStart: '2020-12-31', dateEnd: '2021-01-01' })), [
    'A',
    'B',
    'C',
    'D',
    'E'
  ]);
});

test('combines criteria conjunctively regardless of order', () => {
  const criteria: SiteFilterCriteria[] = [
    { latitudeRange: [40, 46] },
    { longitudeRange: [-121, -104.5] },
    { state: ['CO', 'OR'] },
    { siteIds: ['A', 'C', 'E'] }
  ];
  const combined = filterSites(sites, { ...criteria[0], ...criteria[1], ...criteria[2], ...criteria[3] });
  assert.deepEqual(ids(combined), ['A', 'C']);

  const forward = criteria.reduce<SiteRecord[]>((current, next) => filterSites(current, next), sites);
  const backward = [...criteria]
    .reverse()
    .reduce<SiteRecord[]>((current, next) => filterSites(current, next), sites);
  assert.deepEqual(ids(forward), ids(combined));
  assert.deepEqual(ids(backward), ids(combined));
});

test('never grows the site set', () => {
  const variants: SiteFilterCriteria[] = [
    {},
    { latitudeRange: [-90, 90] },
    { state: ['CO'] },
    { siteIds: ['A', 'A', 'B'] },
    { dateStart: '1990-01-01', dateEnd: '2030-01-01' }
  ];
  for (const criteria of variants) {
    assert.ok(filterSites(sites, criteria).length <= sites.length);
  }
  assert.equal(filterSites(sites, {}).length, sites.length);
});

test('rejects inverted ranges', () => {
  assert.throws(
    () => filterSites(sites, { latitudeRange: [45, 40] }),
    (error: unknown) => error instanceof InvalidRangeError && error.field === 'latitude_range'
  );
  assert.throws(
    () => filterSites(sites, { dateStart: '2020-02-01', dateEnd: '2020-01-31' }),
    (error: unknown) => error instanceof InvalidRangeError && error.field === 'date'
  );
});
