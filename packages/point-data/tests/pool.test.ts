import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { test } from 'node:test';

import { QueryAbortedError, mapWithConcurrency } from '../src';

test('keeps results in input order whatever the completion order', async () => {
  const durations = [30, 5, 20, 1, 10];
  const results = await mapWithConcurrency(durations, 3, async (duration, index) => {
    await delay(duration);
    return `${index}:${duration}`;
  });
  assert.deepEqual(results, ['0:30', '1:5', '2:20', '3:1', '4:10']);
});

test('never runs more tasks than the concurrency bound', async () => {
  let inFlight = 0;
  let peak = 0;
  await mapWithConcurrency(Array.from({ length: 10 }, (_, index) => index), 2, async () => {
    inFlight += 1;
    peak = Math.max(peak, inFlight);
    await delay(2);
    inFlight -= 1;
  });
  assert.equal(peak, 2);
});

test('rethrows the first task failure', async () => {
  const started: number[] = [];
  await assert.rejects(
    mapWithConcurrency([1, 2, 3, 4, 5, 6], 1, async (value) => {
      started.push(value);
      if (value === 2) {
        throw new Error('boom');
      }
      return value;
    }),
    /boom/
  );
  assert.deepEqual(started, [1, 2]);
});

test('stops scheduling once the signal aborts', async () => {
  const controller = new AbortController();
  const started: number[] = [];
  await assert.rejects(
    mapWithConcurrency(
      [1, 2, 3],
      1,
      async (value) => {
        started.push(value);
        controller.abort();
        return value;
      },
      controller.signal
    ),
    QueryAbortedError
  );
  assert.deepEqual(started, [1]);
});

test('handles an empty input', async () => {
  assert.deepEqual(await mapWithConcurrency([], 4, async () => 1), []);
});
