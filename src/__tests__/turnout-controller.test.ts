import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { TurnoutController } from '../devices/turnout-controller';
import { SimulatedBackend } from '../hardware/simulated-backend';
import { ResourceError } from '../errors';

const TURNOUT_3 = { servoAddress: 3, thrownAngle: 85, closedAngle: 95 };

function reasonOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof ResourceError ? err.reason : `unexpected: ${String(err)}`;
  }
}

describe('TurnoutController', () => {
  it('should move to the closed angle when active', () => {
    const backend = new SimulatedBackend();
    const turnouts = new TurnoutController(backend);

    assert.equal(turnouts.setPosition({ ...TURNOUT_3, active: true }), 95);
    assert.equal(backend.servos.get(3)?.angle, 95);
    assert.equal(turnouts.position(3), true);
  });

  it('should move to the thrown angle when inactive', () => {
    const backend = new SimulatedBackend();
    const turnouts = new TurnoutController(backend);

    assert.equal(turnouts.setPosition({ ...TURNOUT_3, active: false }), 85);
    assert.equal(backend.servos.get(3)?.angle, 85);
    assert.equal(turnouts.position(3), false);
  });

  it('should open each servo channel once', () => {
    const backend = new SimulatedBackend();
    const turnouts = new TurnoutController(backend);

    turnouts.setPosition({ ...TURNOUT_3, active: true });
    turnouts.setPosition({ ...TURNOUT_3, active: false });
    turnouts.setPosition({ servoAddress: 0, thrownAngle: 10, closedAngle: 20, active: true });

    assert.equal(backend.openCalls.servos, 2);
    assert.deepEqual(backend.servos.get(3)?.history, [95, 85]);
    assert.deepEqual(turnouts.servoChannels, [0, 3]);
  });

  it('should report a servo that cannot be opened and retry on the next command', () => {
    const backend = new SimulatedBackend();
    const turnouts = new TurnoutController(backend);
    backend.unavailable.servos.add(3);

    assert.equal(reasonOf(() => turnouts.setPosition({ ...TURNOUT_3, active: true })), 'servo-init-failed');
    assert.deepEqual(turnouts.servoChannels, []);

    backend.unavailable.servos.delete(3);
    assert.equal(turnouts.setPosition({ ...TURNOUT_3, active: true }), 95);
    assert.equal(backend.openCalls.servos, 2);
  });

  it('should report a failed write and keep the last position', () => {
    const backend = new SimulatedBackend();
    const turnouts = new TurnoutController(backend);
    turnouts.setPosition({ ...TURNOUT_3, active: true });

    const servo = backend.servos.get(3);
    assert.ok(servo);
    servo.failWrites = true;

    assert.equal(reasonOf(() => turnouts.setPosition({ ...TURNOUT_3, active: false })), 'servo-write-failed');
    assert.equal(servo.angle, 95);
    assert.equal(turnouts.position(3), true);
  });
});
