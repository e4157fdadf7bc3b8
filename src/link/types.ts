/**
 * Link Types
 *
 * Connection state machine, timing and reconnect settings for the
 * framed TCP link between the layout bridge and an actuator node.
 */

/** Link states. `failed` also covers a link that has been stopped. */
export type LinkState = 'connecting' | 'active' | 'failed';

/** Which side opened the TCP connection */
export type LinkRole = 'client' | 'server';

/** Reconnect delay settings */
export interface ReconnectConfig {
  backoffMs: number;      // delay before the first retry
  maxBackoffMs: number;   // backoff cap (equal to backoffMs = fixed delay)
}

export interface LinkOptions {
  /** Read-timeout period and connect timeout */
  connTimeoutMs: number;
  /** Consecutive silent read periods tolerated before the link is declared dead */
  maxHeartbeatFail: number;
  reconnect: ReconnectConfig;
}

export const CONN_TIMEOUT_MS = 3000;
export const MAX_HEARTBEAT_FAIL = 5;

/** Default link settings: 3s read timeout, 5 misses, fixed 3s reconnect delay */
export const DEFAULT_LINK_OPTIONS: LinkOptions = {
  connTimeoutMs: CONN_TIMEOUT_MS,
  maxHeartbeatFail: MAX_HEARTBEAT_FAIL,
  reconnect: {
    backoffMs: CONN_TIMEOUT_MS,
    maxBackoffMs: CONN_TIMEOUT_MS,
  },
};

/** Idle send time after which a heartbeat byte goes out (7.5s with defaults) */
export function heartbeatIntervalMs(options: LinkOptions): number {
  return (options.connTimeoutMs * options.maxHeartbeatFail) / 2;
}

/** Merge partial settings over the defaults */
export function resolveLinkOptions(partial?: Partial<LinkOptions>): LinkOptions {
  const connTimeoutMs = partial?.connTimeoutMs ?? DEFAULT_LINK_OPTIONS.connTimeoutMs;
  return {
    connTimeoutMs,
    maxHeartbeatFail: partial?.maxHeartbeatFail ?? DEFAULT_LINK_OPTIONS.maxHeartbeatFail,
    reconnect: partial?.reconnect ?? { backoffMs: connTimeoutMs, maxBackoffMs: connTimeoutMs },
  };
}
