import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { LivenessMonitor } from '../link/liveness';
import { MAX_HEARTBEAT_FAIL } from '../link/types';

describe('LivenessMonitor', () => {
  it('should tolerate up to maxHeartbeatFail silent periods', () => {
    const monitor = new LivenessMonitor(MAX_HEARTBEAT_FAIL);
    for (let i = 0; i < MAX_HEARTBEAT_FAIL; i++) {
      assert.equal(monitor.recordReadTimeout(), false);
    }
    assert.equal(monitor.consecutiveFailures, MAX_HEARTBEAT_FAIL);
  });

  it('should declare the link dead on silent period maxHeartbeatFail + 1', () => {
    const monitor = new LivenessMonitor(5);
    const results: boolean[] = [];
    for (let i = 0; i < 6; i++) results.push(monitor.recordReadTimeout());
    assert.deepEqual(results, [false, false, false, false, false, true]);
  });

  it('should reset the count when data arrives', () => {
    const monitor = new LivenessMonitor(5);
    for (let i = 0; i < 4; i++) monitor.recordReadTimeout();
    monitor.recordData();
    assert.equal(monitor.consecutiveFailures, 0);
    assert.equal(monitor.recordReadTimeout(), false);
    assert.equal(monitor.consecutiveFailures, 0);
  });

  it('should count the period after a data period as silent', () => {
    const monitor = new LivenessMonitor(5);
    monitor.recordData();
    monitor.recordReadTimeout();
    monitor.recordReadTimeout();
    assert.equal(monitor.consecutiveFailures, 1);
  });

  it('should clear everything on reset', () => {
    const monitor = new LivenessMonitor(1);
    monitor.recordReadTimeout();
    monitor.reset();
    assert.equal(monitor.consecutiveFailures, 0);
    assert.equal(monitor.recordReadTimeout(), false);
  });
});
