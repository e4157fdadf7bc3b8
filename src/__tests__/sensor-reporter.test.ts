import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { SensorReporter } from '../devices/sensor-reporter';
import { SimulatedBackend, SimulatedInputPin } from '../hardware/simulated-backend';
import { ResourceError } from '../errors';

function setup(linkUp = true): { backend: SimulatedBackend; sent: string[]; sensors: SensorReporter } {
  const backend = new SimulatedBackend();
  const sent: string[] = [];
  const sensors = new SensorReporter(backend, (message) => {
    if (!linkUp) return false;
    sent.push(message);
    return true;
  });
  return { backend, sent, sensors };
}

function input(backend: SimulatedBackend, gpio: number): SimulatedInputPin {
  const pin = backend.inputs.get(gpio);
  assert.ok(pin);
  return pin;
}

describe('SensorReporter', () => {
  it('should report the current level on registration', () => {
    const { sent, sensors } = setup();
    assert.equal(sensors.register(5), 0);
    assert.deepEqual(sent, ['IN:5:0']);
  });

  it('should report each change of level', () => {
    const { backend, sent, sensors } = setup();
    sensors.register(5);

    input(backend, 5).simulate(true);
    input(backend, 5).simulate(false);

    assert.deepEqual(sent, ['IN:5:0', 'IN:5:1', 'IN:5:0']);
    assert.equal(sensors.level(5), 0);
  });

  it('should not repeat a level that did not change', () => {
    const { backend, sent, sensors } = setup();
    sensors.register(5);

    input(backend, 5).simulate(true);
    input(backend, 5).simulate(true);

    assert.deepEqual(sent, ['IN:5:0', 'IN:5:1']);
  });

  it('should re-report on re-registration without opening the pin again', () => {
    const { backend, sent, sensors } = setup();
    sensors.register(5);
    input(backend, 5).simulate(true);

    assert.equal(sensors.register(5), 1);

    assert.deepEqual(sent, ['IN:5:0', 'IN:5:1', 'IN:5:1']);
    assert.equal(backend.openCalls.inputs, 1);
    assert.equal(input(backend, 5).listenerCount, 1);
  });

  it('should report a pin that cannot be opened', () => {
    const { backend, sent, sensors } = setup();
    backend.unavailable.inputs.add(5);

    assert.throws(
      () => sensors.register(5),
      (err: unknown) => err instanceof ResourceError && err.reason === 'input-init-failed',
    );
    assert.deepEqual(sent, []);
    assert.deepEqual(sensors.registeredPins, []);
  });

  it('should track the level while the link is down', () => {
    const { backend, sensors } = setup(false);
    assert.equal(sensors.register(5), 0);

    input(backend, 5).simulate(true);
    assert.equal(sensors.level(5), 1);
  });

  it('should release every pin on close', () => {
    const { backend, sent, sensors } = setup();
    sensors.register(5);
    sensors.register(6);

    sensors.close();
    input(backend, 5).simulate(true);

    assert.equal(input(backend, 5).closed, true);
    assert.equal(input(backend, 6).closed, true);
    assert.equal(input(backend, 6).listenerCount, 0);
    assert.deepEqual(sensors.registeredPins, []);
    assert.deepEqual(sent, ['IN:5:0', 'IN:6:0']);
  });
});
