import assert from 'node:assert/strict';
import { test } from 'node:test';

import { DATA_POLICIES, UnsupportedCombinationError } from '@point-obs/point-data';

import { createInterface } from '../program';
import {
  createFixtureArchive,
  dailyCsv,
  type FixtureArchive
} from '../../../point-data/tests/helpers/archive';

const buildArchive = async (): Promise<FixtureArchive> => {
  const archive = await createFixtureArchive({
    sites: [
      { siteId: 'A', latitude: 42, longitude: -105, doi: '10.0000/a' },
      { siteId: 'B', latitude: 50, longitude: -110 }
    ],
    observations: [
      { siteId: 'A', varId: 2, first: '2020-01-01', last: '2020-01-03', recordCount: 3 },
      { siteId: 'B', varId: 2, first: '2020-01-01', last: '2020-01-01', recordCount: 1 }
    ]
  });
  await archive.writeFile('streamflow/data/daily/A.csv', dailyCsv('streamflow', '2020-01-01', [1.5, 2.5, 3.5]));
  await archive.writeFile('streamflow/data/daily/B.csv', dailyCsv('streamflow', '2020-01-01', [9]));
  return archive;
};

const run = async (args: string[]): Promise<string[]> => {
  const printed: string[] = [];
  const program = createInterface({ print: (text) => printed.push(text), env: {} });
  await program.parseAsync(args, { from: 'user' });
  return printed;
};

test('sources prints the availability table', async () => {
  const [table] = await run(['sources']);
  const lines = table.split('\n');
  assert.equal(lines.length, 25);
  assert.ok(lines[0].startsWith('variable_name'));

  const [json] = await run(['--json', 'sources']);
  assert.equal(JSON.parse(json).length, 24);
});

test('query prints observations as CSV', async (t) => {
  const archive = await buildArchive();
  t.after(() => archive.cleanup());

  const [output] = await run([
    '--archive-root',
    archive.root,
    'query',
    'usgs_nwis',
    'streamflow',
    'daily',
    'average',
    '--date-start',
    '2020-01-02'
  ]);
  assert.equal(output, ['site_id,timestamp,value', 'A,2020-01-02,2.5', 'A,2020-01-03,3.5'].join('\n'));
});

test('query forwards filters and prints JSON with metadata', async (t) => {
  const archive = await buildArchive();
  t.after(() => archive.cleanup());

  const [output] = await run([
    '--archive-root',
    archive.root,
    '--json',
    'query',
    'usgs_nwis',
    'streamflow',
    'daily',
    'average',
    '--latitude-range',
    '[40, 45]',
    '--site-id',
    'A',
    'B',
    '--metadata'
  ]);
  const result = JSON.parse(output);
  assert.deepEqual(
    result.observations.map((row: { value: number }) => row.value),
    [1.5, 2.5, 3.5]
  );
  assert.equal(result.metadata.rows.length, 1);
  assert.equal(result.metadata.rows[0].site_id, 'A');
});

test('query rejects unregistered combinations', async () => {
  await assert.rejects(
    run(['--archive-root', '/nonexistent-archive', 'query', 'usgs_nwis', 'swe', 'daily', 'start-of-day']),
    UnsupportedCombinationError
  );
});

test('citation prints the policy and requested DOIs', async (t) => {
  const archive = await buildArchive();
  t.after(() => archive.cleanup());

  const [output] = await run(['--archive-root', archive.root, 'citation', 'usgs_nwis', '--site-id', 'A', 'B']);
  assert.equal(output, [DATA_POLICIES.usgs_nwis, '', 'A: 10.0000/a', 'B: no DOI on record'].join('\n'));

  const [policyOnly] = await run(['citation', 'ameriflux']);
  assert.equal(policyOnly, DATA_POLICIES.ameriflux);
});
