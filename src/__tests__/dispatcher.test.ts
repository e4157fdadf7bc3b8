import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { CommandDispatcher } from '../protocol/dispatcher';
import { ResourceError } from '../errors';

function collector(): { replies: string[]; reply: (message: string) => boolean } {
  const replies: string[] = [];
  return { replies, reply: (message) => { replies.push(message); return true; } };
}

describe('CommandDispatcher', () => {
  it('should call the handler for a valid command', async () => {
    const { replies, reply } = collector();
    const seen: number[] = [];
    const dispatcher = new CommandDispatcher('test', {
      turnoutSet: (cmd) => { seen.push(cmd.servoAddress); },
    }, reply);

    dispatcher.dispatch('OUT_TO:3[85][95]:1');
    await dispatcher.idle();

    assert.deepEqual(seen, [3]);
    assert.deepEqual(replies, []);
    assert.equal(dispatcher.counters.handled, 1);
  });

  it('should handle frames in arrival order even when a handler is slow', async () => {
    const { reply } = collector();
    const order: number[] = [];
    const dispatcher = new CommandDispatcher('test', {
      turnoutSet: async (cmd) => {
        if (cmd.servoAddress === 1) await delay(30);
        order.push(cmd.servoAddress);
      },
    }, reply);

    dispatcher.dispatch('OUT_TO:1[85][95]:1');
    dispatcher.dispatch('OUT_TO:2[85][95]:1');
    dispatcher.dispatch('OUT_TO:3[85][95]:1');
    await dispatcher.idle();

    assert.deepEqual(order, [1, 2, 3]);
  });

  it('should answer a malformed frame without calling a handler', async () => {
    const { replies, reply } = collector();
    let calls = 0;
    const dispatcher = new CommandDispatcher('test', { turnoutSet: () => { calls++; } }, reply);

    dispatcher.dispatch('OUT_TO:3[xx][95]:1');
    await dispatcher.idle();

    assert.equal(calls, 0);
    assert.deepEqual(replies, ['ERROR:invalid-angle:OUT_TO:3[xx][95]:1']);
    assert.equal(dispatcher.counters.rejected, 1);
  });

  it('should answer a command this side does not accept', async () => {
    const { replies, reply } = collector();
    const dispatcher = new CommandDispatcher('test', {}, reply);

    dispatcher.dispatch('IN:5:1');
    await dispatcher.idle();

    assert.deepEqual(replies, ['ERROR:unsupported-command:IN:5:1']);
    assert.equal(dispatcher.counters.failed, 1);
  });

  it('should report the reason of a failed handler', async () => {
    const { replies, reply } = collector();
    const dispatcher = new CommandDispatcher('test', {
      turnoutSet: async () => { throw new ResourceError('servo-init-failed', 'no controller'); },
    }, reply);

    dispatcher.dispatch('OUT_TO:3[85][95]:1');
    await dispatcher.idle();

    assert.deepEqual(replies, ['ERROR:servo-init-failed:OUT_TO:3[85][95]:1']);
  });

  it('should report an unexpected error as internal', async () => {
    const { replies, reply } = collector();
    const dispatcher = new CommandDispatcher('test', {
      sensorRegister: () => { throw new Error('boom'); },
    }, reply);

    dispatcher.dispatch('IN:5');
    await dispatcher.idle();

    assert.deepEqual(replies, ['ERROR:internal:IN:5']);
  });

  it('should never answer a diagnostic', async () => {
    const { replies, reply } = collector();
    const reasons: string[] = [];
    const dispatcher = new CommandDispatcher('test', {
      diagnostic: (cmd) => { reasons.push(cmd.reason); },
    }, reply);

    dispatcher.dispatch('ERROR:invalid-angle:OUT_TO:3[xx][95]:1');
    dispatcher.dispatch('ERROR:unknown-command:FOO');
    await dispatcher.idle();

    assert.deepEqual(replies, []);
    assert.deepEqual(reasons, ['invalid-angle', 'unknown-command']);
    assert.equal(dispatcher.counters.diagnostics, 2);
  });

  it('should keep going when the reply cannot be sent', async () => {
    let attempts = 0;
    const dispatcher = new CommandDispatcher('test', {}, () => {
      attempts++;
      throw new Error('socket gone');
    });

    dispatcher.dispatch('FOO');
    dispatcher.dispatch('BAR');
    await dispatcher.idle();

    assert.equal(attempts, 2);
    assert.equal(dispatcher.counters.rejected, 2);
  });

  it('should wait for frames queued while idle() is pending', async () => {
    const { reply } = collector();
    const seen: number[] = [];
    const dispatcher = new CommandDispatcher('test', {
      sensorRegister: async (cmd) => {
        await delay(5);
        seen.push(cmd.gpio);
        if (cmd.gpio === 1) dispatcher.dispatch('IN:2');
      },
    }, reply);

    dispatcher.dispatch('IN:1');
    await dispatcher.idle();

    assert.deepEqual(seen, [1, 2]);
  });
});
