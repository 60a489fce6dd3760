import assert from 'node:assert/strict';
import { test } from 'node:test';
import { DriftCorrectedTicker } from '../src/audio/frameTicker';

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

test('dueTicks counts whole intervals since start', () => {
  const ticker = new DriftCorrectedTicker(20, () => 1000);
  ticker.start(() => undefined);
  try {
    assert.equal(ticker.dueTicks(1000), 0);
    assert.equal(ticker.dueTicks(1039), 1);
    assert.equal(ticker.dueTicks(1100), 5);
  } finally {
    ticker.stop();
  }
});

test('a late wake-up fires the missed ticks back to back', async () => {
  let now = 0;
  let ticks = 0;
  const ticker = new DriftCorrectedTicker(20, () => now);
  ticker.start(() => {
    ticks += 1;
  });
  now = 45;
  await wait(60);
  ticker.stop();

  assert.equal(ticks, 2);
});

test('catch-up is capped and the clock skips ahead', async () => {
  let now = 0;
  let ticks = 0;
  const ticker = new DriftCorrectedTicker(20, () => now);
  ticker.start(() => {
    ticks += 1;
  });
  now = 1000;
  await wait(60);

  assert.equal(ticks, 5);
  assert.equal(ticker.dueTicks(1000), 0);
  ticker.stop();
});

test('stop cancels pending ticks and a second start is ignored', async () => {
  let now = 0;
  const seen: string[] = [];
  const ticker = new DriftCorrectedTicker(20, () => now);
  ticker.start(() => seen.push('first'));
  ticker.start(() => seen.push('second'));
  ticker.stop();
  now = 100;
  await wait(40);

  assert.deepEqual(seen, []);
});
