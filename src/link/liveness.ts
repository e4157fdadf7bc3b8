/**
 * Liveness Monitor
 *
 * Counts consecutive read periods in which nothing (not even a heartbeat)
 * arrived. The owning link calls `recordReadTimeout()` once per period;
 * the link is dead once the count exceeds `maxHeartbeatFail`.
 */

export class LivenessMonitor {
  private readonly maxHeartbeatFail: number;
  private failCount = 0;
  private sawData = false;

  constructor(maxHeartbeatFail: number) {
    this.maxHeartbeatFail = maxHeartbeatFail;
  }

  /** Any bytes received, heartbeat included */
  recordData(): void {
    this.failCount = 0;
    this.sawData = true;
  }

  /**
   * Close one read period. Returns true when the link must be
   * treated as dead.
   */
  recordReadTimeout(): boolean {
    if (this.sawData) {
      this.sawData = false;
      return false;
    }
    this.failCount++;
    return this.failCount > this.maxHeartbeatFail;
  }

  reset(): void {
    this.failCount = 0;
    this.sawData = false;
  }

  get consecutiveFailures(): number {
    return this.failCount;
  }
}
