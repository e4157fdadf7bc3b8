import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { SignalHeadController } from '../devices/signal-head-controller';
import { BlinkScheduler } from '../devices/blink-scheduler';
import { SimulatedBackend, SimulatedExtender } from '../hardware/simulated-backend';
import { ResourceError } from '../errors';
import { Aspect } from '../protocol/commands';

const WIRING = { headId: 'SM1-SH1', boardAddress: 0x24, redPin: 6, greenPin: 14 };

function setup(): { backend: SimulatedBackend; scheduler: BlinkScheduler; heads: SignalHeadController } {
  const backend = new SimulatedBackend();
  const scheduler = new BlinkScheduler();
  return { backend, scheduler, heads: new SignalHeadController(backend, scheduler) };
}

function board(backend: SimulatedBackend, address = 0x24): SimulatedExtender {
  const extender = backend.extenders.get(address);
  assert.ok(extender);
  return extender;
}

function failsWith(reason: string): (err: unknown) => boolean {
  return (err) => err instanceof ResourceError && err.reason === reason;
}

describe('SignalHeadController', () => {
  it('should drive every pin of a new board low first', async () => {
    const { backend, heads } = setup();
    await heads.setAspect({ ...WIRING, aspect: 'dark' });

    const writes = board(backend).writes;
    assert.deepEqual(
      writes.slice(0, 16).map((w) => [w.pin, w.value]),
      Array.from({ length: 16 }, (_, pin) => [pin, false]),
    );
  });

  it('should show green with red off', async () => {
    const { backend, scheduler, heads } = setup();
    await heads.setAspect({ ...WIRING, aspect: 'green' });

    const extender = board(backend);
    assert.equal(extender.pins[14], true);
    assert.equal(extender.pins[6], false);
    assert.equal(scheduler.isRunning('SM1-SH1'), false);
    assert.equal(heads.getAspect('SM1-SH1'), 'green');
  });

  it('should show red with green off', async () => {
    const { backend, heads } = setup();
    await heads.setAspect({ ...WIRING, aspect: 'red' });

    assert.equal(board(backend).pins[6], true);
    assert.equal(board(backend).pins[14], false);
  });

  it('should blink red and stop blinking on the next aspect', async () => {
    const { backend, scheduler, heads } = setup();
    await heads.setAspect({ ...WIRING, aspect: 'flashing-red' });

    const extender = board(backend);
    assert.equal(extender.pins[6], true);
    assert.equal(extender.pins[14], false);
    assert.equal(scheduler.isRunning('SM1-SH1'), true);

    await heads.setAspect({ ...WIRING, aspect: 'green' });

    assert.equal(scheduler.isRunning('SM1-SH1'), false);
    assert.equal(extender.pins[6], false);
    assert.equal(extender.pins[14], true);
    // init low, blink on, blink off on cancel, green sets red off
    assert.deepEqual(extender.writesTo(6).map((w) => w.value), [false, true, false, false]);
  });

  it('should keep one blinker per head under rapid commands', async () => {
    const { scheduler, heads } = setup();
    const aspects: Aspect[] = ['flashing-red', 'flashing-green', 'flashing-red', 'flashing-green', 'flashing-red'];

    await Promise.all(aspects.map((aspect) => heads.setAspect({ ...WIRING, aspect })));

    assert.deepEqual(scheduler.runningHeads, ['SM1-SH1']);
    assert.equal(heads.getAspect('SM1-SH1'), 'flashing-red');
    await heads.shutdown();
  });

  it('should report a board that cannot be opened', async () => {
    const { backend, heads } = setup();
    backend.unavailable.extenders.add(0x24);

    await assert.rejects(heads.setAspect({ ...WIRING, aspect: 'red' }), failsWith('board-init-failed'));
    assert.equal(heads.getAspect('SM1-SH1'), undefined);

    backend.unavailable.extenders.delete(0x24);
    await heads.setAspect({ ...WIRING, aspect: 'red' });
    assert.equal(heads.getAspect('SM1-SH1'), 'red');
  });

  it('should report a failed LED write and keep the previous aspect', async () => {
    const { backend, heads } = setup();
    await heads.setAspect({ ...WIRING, aspect: 'green' });
    board(backend).failWrites = true;

    await assert.rejects(heads.setAspect({ ...WIRING, aspect: 'red' }), failsWith('led-write-failed'));
    assert.equal(heads.getAspect('SM1-SH1'), 'green');
  });

  it('should share one board between heads', async () => {
    const { backend, heads } = setup();
    await heads.setAspect({ ...WIRING, aspect: 'red' });
    await heads.setAspect({ headId: 'SM1-SH2', boardAddress: 0x24, redPin: 0, greenPin: 1, aspect: 'green' });

    assert.equal(backend.openCalls.extenders, 1);
    assert.deepEqual(heads.status(), [
      { ...WIRING, aspect: 'red', blinking: false },
      { headId: 'SM1-SH2', boardAddress: 0x24, redPin: 0, greenPin: 1, aspect: 'green', blinking: false },
    ]);
  });

  it('should darken every head and stop blinkers on shutdown', async () => {
    const { backend, scheduler, heads } = setup();
    await heads.setAspect({ ...WIRING, aspect: 'flashing-green' });
    await heads.setAspect({ headId: 'SM1-SH2', boardAddress: 0x24, redPin: 0, greenPin: 1, aspect: 'red' });

    await heads.shutdown();

    const extender = board(backend);
    assert.deepEqual(scheduler.runningHeads, []);
    assert.deepEqual([6, 14, 0, 1].map((pin) => extender.pins[pin]), [false, false, false, false]);
    assert.equal(heads.getAspect('SM1-SH1'), 'dark');
    assert.equal(heads.getAspect('SM1-SH2'), 'dark');
  });
});
