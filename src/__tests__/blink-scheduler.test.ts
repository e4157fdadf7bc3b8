import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { BlinkScheduler, DEFAULT_BLINK_OPTIONS } from '../devices/blink-scheduler';

function recorder(): { writes: boolean[]; write: (value: boolean) => void } {
  const writes: boolean[] = [];
  return { writes, write: (value) => { writes.push(value); } };
}

describe('BlinkScheduler', () => {
  it('should default to 2 Hz at 50% duty', () => {
    assert.deepEqual(new BlinkScheduler().options, { frequencyHz: 2, dutyCycle: 0.5 });
    assert.deepEqual(DEFAULT_BLINK_OPTIONS, { frequencyHz: 2, dutyCycle: 0.5 });
  });

  it('should turn the LED on immediately and toggle it', async () => {
    const scheduler = new BlinkScheduler({ frequencyHz: 50 });
    const { writes, write } = recorder();

    await scheduler.start('H1', write);
    assert.deepEqual(writes, [true]);
    assert.equal(scheduler.isRunning('H1'), true);

    await delay(75);
    assert.equal(await scheduler.cancel('H1'), true);

    assert.ok(writes.length >= 4);
    writes.forEach((value, i) => assert.equal(value, i % 2 === 0));
    assert.equal(writes[writes.length - 1], false);
    assert.equal(scheduler.isRunning('H1'), false);
  });

  it('should stop promptly when cancelled in a long phase', async () => {
    const scheduler = new BlinkScheduler({ frequencyHz: 0.5 });
    const { writes, write } = recorder();

    await scheduler.start('H1', write);
    const startedAt = Date.now();
    await scheduler.cancel('H1');

    assert.ok(Date.now() - startedAt < 200);
    assert.deepEqual(writes, [true, false]);
  });

  it('should return false when cancelling a head that is not blinking', async () => {
    const scheduler = new BlinkScheduler();
    assert.equal(await scheduler.cancel('nope'), false);
  });

  it('should keep at most one blinker per head', async () => {
    const scheduler = new BlinkScheduler({ frequencyHz: 50 });
    const first = recorder();
    const second = recorder();

    await scheduler.start('H1', first.write);
    await scheduler.start('H1', second.write);
    const firstWrites = first.writes.length;

    await delay(50);
    assert.deepEqual(scheduler.runningHeads, ['H1']);
    assert.equal(first.writes.length, firstWrites);
    assert.equal(first.writes[firstWrites - 1], false);
    assert.ok(second.writes.length >= 2);

    await scheduler.cancelAll();
  });

  it('should report a failing write and drop the task', async () => {
    let reportFailure: (headId: string) => void = () => undefined;
    const failed = new Promise<string>((resolve) => { reportFailure = resolve; });
    const blinker = new BlinkScheduler({ frequencyHz: 50 }, (headId) => reportFailure(headId));

    let calls = 0;
    await blinker.start('H1', () => {
      calls++;
      if (calls === 2) throw new Error('board gone');
    });

    assert.equal(await failed, 'H1');
    await delay(5);
    assert.equal(blinker.isRunning('H1'), false);
    assert.equal(calls, 2);
  });

  it('should stop every blinker on cancelAll', async () => {
    const scheduler = new BlinkScheduler({ frequencyHz: 50 });
    await scheduler.start('H1', recorder().write);
    await scheduler.start('H2', recorder().write);
    assert.deepEqual(scheduler.runningHeads, ['H1', 'H2']);

    await scheduler.cancelAll();
    assert.deepEqual(scheduler.runningHeads, []);
  });
});
