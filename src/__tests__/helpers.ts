/**
 * Test helpers: polling and a bare TCP peer on an ephemeral port.
 */

import * as net from 'net';
import { once } from 'events';
import { setTimeout as delay } from 'node:timers/promises';
import { LinkOptions } from '../link/types';
import { LinkManager } from '../link/link-manager';
import { encodeFrame } from '../link/frame-codec';
import { endpointAlias } from '../registry/endpoint-registry';

/** Short timings so liveness and reconnect play out within a test */
export const FAST_LINK: LinkOptions = {
  connTimeoutMs: 50,
  maxHeartbeatFail: 4,
  reconnect: { backoffMs: 20, maxBackoffMs: 20 },
};

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await delay(5);
  }
}

export interface RawPeer {
  port: number;
  /** Accepted sockets, oldest first */
  sockets: net.Socket[];
  /** Text received on each accepted socket, by index */
  received: string[];
  close(): Promise<void>;
}

/** A plain TCP server standing in for the far end of a client link */
export async function startRawPeer(): Promise<RawPeer> {
  const sockets: net.Socket[] = [];
  const received: string[] = [];
  const server = net.createServer((sock) => {
    const index = sockets.length;
    sockets.push(sock);
    received.push('');
    sock.setEncoding('utf8');
    sock.on('data', (text: string) => { received[index] += text; });
    sock.on('error', () => undefined);
  });
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Raw peer has no port');

  return {
    port: address.port,
    sockets,
    received,
    close: () => new Promise<void>((resolve) => {
      for (const sock of sockets) sock.destroy();
      server.close(() => resolve());
    }),
  };
}

/** A port nothing listens on */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Probe has no port');
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

/** Connect a plain socket that records what it receives */
export async function connectRaw(port: number): Promise<{ sock: net.Socket; text: () => string }> {
  let received = '';
  const sock = net.createConnection({ host: '127.0.0.1', port });
  sock.setEncoding('utf8');
  sock.on('data', (chunk: string) => { received += chunk; });
  sock.on('error', () => undefined);
  await once(sock, 'connect');
  return { sock, text: () => received };
}

/**
 * In-process link: never opens a socket. Tests drive it with connect(),
 * disconnect() and receive(), and read what was sent from `sent`.
 * waitForActive() is inherited, so it waits for connect() like a real link.
 */
export class FakeLink extends LinkManager {
  readonly sent: string[] = [];
  opened = 0;
  released = false;
  private up = false;

  constructor(host: string, port: number) {
    super(endpointAlias(host, port), 'client', host, port);
  }

  protected open(): void {
    this.opened++;
  }

  protected async release(): Promise<void> {
    this.released = true;
  }

  isActive(): boolean {
    return this.up && !this.stopped;
  }

  send(message: string): boolean {
    encodeFrame(message);
    if (!this.isActive()) return false;
    this.sent.push(message);
    return true;
  }

  connect(): void {
    this.up = true;
    this.emit('connected');
  }

  disconnect(reason = 'heartbeat timeout'): void {
    this.up = false;
    this.emit('disconnected', reason);
  }

  receive(frame: string): void {
    this.emit('frame', frame);
  }
}
