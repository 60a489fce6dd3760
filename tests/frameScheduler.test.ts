import assert from 'node:assert/strict';
import { test } from 'node:test';
import { FrameScheduler, type OverrunEvent } from '../src/audio/frameScheduler';
import { CodecContractViolation } from '../src/calls/errors';

function scheduler(overrides: Partial<ConstructorParameters<typeof FrameScheduler>[0]> = {}): FrameScheduler {
  return new FrameScheduler({ sampleRateHz: 8000, frameMs: 20, highWaterMs: 20000, partialHoldMs: 60, ...overrides });
}

test('frame size is 20 ms of 8 kHz pcm16', () => {
  assert.equal(scheduler().frameBytes, 320);
});

test('a 500 ms burst comes out as 25 full frames', () => {
  const s = scheduler();
  s.push(Buffer.alloc(8000, 7));
  assert.equal(s.bufferedMs, 500);

  const kinds: string[] = [];
  for (let i = 0; i < 25; i += 1) {
    const frame = s.nextFrame();
    assert.ok(frame);
    assert.equal(frame.pcm.length, 320);
    kinds.push(frame.kind);
  }
  assert.ok(kinds.every((kind) => kind === 'audio'));
  assert.equal(s.bufferedBytes, 0);
  assert.equal(s.nextFrame()?.kind, 'silence');
});

test('an empty scheduler emits silence frames', () => {
  const frame = scheduler().nextFrame();
  assert.ok(frame);
  assert.equal(frame.kind, 'silence');
  assert.deepEqual(frame.pcm, Buffer.alloc(320));
});

test('a partial frame is held for the hold window, then padded', () => {
  const s = scheduler();
  s.push(Buffer.alloc(100, 9));

  assert.equal(s.nextFrame()?.kind, 'silence');
  assert.equal(s.nextFrame()?.kind, 'silence');
  assert.equal(s.nextFrame()?.kind, 'silence');

  const padded = s.nextFrame();
  assert.ok(padded);
  assert.equal(padded.kind, 'padded');
  assert.deepEqual(padded.pcm.subarray(0, 100), Buffer.alloc(100, 9));
  assert.deepEqual(padded.pcm.subarray(100), Buffer.alloc(220));
  assert.equal(s.bufferedBytes, 0);
});

test('a partial frame completed before the hold expires goes out whole', () => {
  const s = scheduler();
  s.push(Buffer.alloc(100, 1));
  assert.equal(s.nextFrame()?.kind, 'silence');
  s.push(Buffer.alloc(220, 2));

  const frame = s.nextFrame();
  assert.equal(frame?.kind, 'audio');
  assert.deepEqual(frame?.pcm.subarray(99, 101), Buffer.from([1, 2]));
});

test('draining pads the remainder immediately and then reports exhaustion', () => {
  const s = scheduler();
  s.push(Buffer.alloc(100, 3));
  s.startDrain();

  assert.equal(s.isDraining, true);
  assert.equal(s.nextFrame()?.kind, 'padded');
  assert.equal(s.nextFrame(), null);
});

test('drop_oldest discards from the head past the high-water mark', () => {
  const events: OverrunEvent[] = [];
  const s = scheduler({ highWaterMs: 100, onOverrun: (event) => events.push(event) });
  assert.equal(s.highWaterBytes, 1600);

  s.push(Buffer.alloc(1000, 1));
  const result = s.push(Buffer.alloc(1000, 2));

  assert.equal(result.droppedBytes, 400);
  assert.equal(s.bufferedBytes, 1600);
  assert.deepEqual(events, [{ droppedBytes: 400, bufferedBytes: 1600, policy: 'drop_oldest' }]);

  assert.deepEqual(s.nextFrame()?.pcm, Buffer.alloc(320, 1));
  const second = s.nextFrame();
  assert.deepEqual(second?.pcm.subarray(0, 280), Buffer.alloc(280, 1));
  assert.deepEqual(second?.pcm.subarray(280), Buffer.alloc(40, 2));
});

test('drop_newest truncates the incoming chunk', () => {
  const events: OverrunEvent[] = [];
  const s = scheduler({ highWaterMs: 100, overrunPolicy: 'drop_newest', onOverrun: (event) => events.push(event) });

  s.push(Buffer.alloc(1000, 1));
  const result = s.push(Buffer.alloc(1000, 2));

  assert.equal(result.droppedBytes, 400);
  assert.equal(s.bufferedBytes, 1600);
  assert.deepEqual(events, [{ droppedBytes: 400, bufferedBytes: 1600, policy: 'drop_newest' }]);
  assert.deepEqual(s.push(Buffer.alloc(2, 3)), { droppedBytes: 2 });
});

test('flush empties the buffer and reports what it discarded', () => {
  const s = scheduler();
  s.push(Buffer.alloc(8000));
  assert.equal(s.flush(), 8000);
  assert.equal(s.bufferedBytes, 0);
  assert.equal(s.nextFrame()?.kind, 'silence');
});

test('odd-length pushes are a contract violation', () => {
  assert.throws(() => scheduler().push(Buffer.alloc(3)), CodecContractViolation);
});
