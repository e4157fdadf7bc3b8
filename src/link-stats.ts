/**
 * LinkStats: Lightweight per-link telemetry
 *
 * Updated by the link manager as it connects, drops and moves frames.
 */

import { LinkRole } from './link/types';

export interface LinkStats {
  alias: string;
  role: LinkRole;
  host: string;
  port: number;
  connected: boolean;
  reconnectCount: number;
  framesReceived: number;
  framesSent: number;
  heartbeatsSent: number;
  lastConnectedAt: number | null;
  lastDisconnectedAt: number | null;
  lastFrameReceivedAt: number | null;
  lastError: string | null;
  lastErrorAt: number | null;
}

export function createLinkStats(
  alias: string,
  role: LinkRole,
  host: string,
  port: number,
): LinkStats {
  return {
    alias,
    role,
    host,
    port,
    connected: false,
    reconnectCount: 0,
    framesReceived: 0,
    framesSent: 0,
    heartbeatsSent: 0,
    lastConnectedAt: null,
    lastDisconnectedAt: null,
    lastFrameReceivedAt: null,
    lastError: null,
    lastErrorAt: null,
  };
}

/** One-line summary for logs */
export function formatLinkStats(stats: LinkStats): string {
  const state = stats.connected ? 'up' : 'down';
  return `${stats.alias} ${state} rx=${stats.framesReceived} tx=${stats.framesSent} ` +
    `hb=${stats.heartbeatsSent} reconnects=${stats.reconnectCount}` +
    (stats.lastError ? ` lastError="${stats.lastError}"` : '');
}
