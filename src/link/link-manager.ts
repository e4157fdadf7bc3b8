/**
 * Link Manager
 *
 * Owns one framed TCP connection to a single peer and keeps it alive:
 *   - (re)connects with backoff until stopped
 *   - sends a heartbeat byte when nothing was written for a while
 *   - declares the link dead after too many silent read periods,
 *     on peer close, or on any socket error
 *   - reassembles '|'-delimited frames across socket reads
 *
 * Subclasses only know how to obtain a socket (connect or accept) and
 * hand it to attach(). Everything after that is shared, so both ends of
 * the link behave identically.
 *
 * Events:
 *   'connected'                    link became active
 *   'disconnected' (reason)        active link dropped
 *   'frame' (frame: string)        one complete inbound frame, in order
 *   'stateChange' (next, prev)     LinkState transition
 *   'finished'                     stop() completed
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import { StringDecoder } from 'string_decoder';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { LinkStats, createLinkStats } from '../link-stats';
import { FrameAssembler, HEARTBEAT, encodeFrame } from './frame-codec';
import { LivenessMonitor } from './liveness';
import { LinkOptions, LinkRole, LinkState, heartbeatIntervalMs, resolveLinkOptions } from './types';

const baseLog = getLogger('Link');

export abstract class LinkManager extends EventEmitter {
  readonly alias: string;
  readonly role: LinkRole;
  readonly host: string;
  readonly port: number;
  readonly stats: LinkStats;

  protected readonly options: LinkOptions;
  protected readonly log: Logger;

  private socket: net.Socket | null = null;
  private _state: LinkState = 'failed';
  private readonly assembler = new FrameAssembler();
  private readonly liveness: LivenessMonitor;
  private readTimer: ReturnType<typeof setInterval> | null = null;
  private heartbeatTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempts = 0;
  private running = false;
  private exitRequested = false;
  private everConnected = false;

  constructor(alias: string, role: LinkRole, host: string, port: number, options?: Partial<LinkOptions>) {
    super();
    this.alias = alias;
    this.role = role;
    this.host = host;
    this.port = port;
    this.options = resolveLinkOptions(options);
    this.liveness = new LivenessMonitor(this.options.maxHeartbeatFail);
    this.stats = createLinkStats(alias, role, host, port);
    this.log = baseLog.child({ alias });
  }

  /** Obtain a socket and pass it to attach(), or call connectFailed() */
  protected abstract open(): void;

  /** Release role-specific resources (pending connect, listening server) */
  protected abstract release(): Promise<void>;

  get state(): LinkState {
    return this._state;
  }

  isActive(): boolean {
    return this._state === 'active' && this.socket !== null;
  }

  /** True once stop() has been requested */
  get stopped(): boolean {
    return this.exitRequested;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.exitRequested = false;
    this.beginOpen();
  }

  /**
   * Send one message. Fails fast (returns false) when the link is not
   * active. Throws FramingError if the message cannot be framed.
   */
  send(message: string): boolean {
    const frame = encodeFrame(message);
    const sock = this.socket;
    if (this._state !== 'active' || !sock) {
      this.log.warn({ message }, 'Link not active, message not sent');
      return false;
    }
    this.write(sock, frame);
    this.stats.framesSent++;
    this.log.debug({ message }, 'Sent');
    return true;
  }

  /** Wait up to timeoutMs for the link to become active, then send */
  async sendWhenActive(message: string, timeoutMs: number): Promise<boolean> {
    const active = await this.waitForActive(timeoutMs);
    return active ? this.send(message) : false;
  }

  /** Resolves true as soon as the link is active, false on timeout or stop */
  waitForActive(timeoutMs: number): Promise<boolean> {
    if (this.isActive()) return Promise.resolve(true);
    if (this.exitRequested) return Promise.resolve(false);

    return new Promise((resolve) => {
      const finish = (active: boolean): void => {
        clearTimeout(timer);
        this.off('connected', onConnected);
        this.off('finished', onFinished);
        resolve(active);
      };
      const onConnected = (): void => finish(true);
      const onFinished = (): void => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);
      this.on('connected', onConnected);
      this.on('finished', onFinished);
    });
  }

  /**
   * Close the link for good. Pending reconnects are cancelled; an open
   * socket is half-closed and given graceMs to finish before it is destroyed.
   */
  async stop(graceMs = 0): Promise<void> {
    if (this.exitRequested && !this.running) return;
    this.exitRequested = true;
    this.running = false;
    this.clearReconnectTimer();
    this.clearLinkTimers();

    const sock = this.socket;
    const wasActive = this.isActive();
    this.socket = null;
    this.assembler.reset();
    this.liveness.reset();

    if (sock) {
      await this.closeSocket(sock, graceMs);
    }
    await this.release();

    this.stats.connected = false;
    this.setState('failed');
    if (wasActive) {
      this.stats.lastDisconnectedAt = Date.now();
      this.emit('disconnected', 'stopped');
    }
    this.log.info('Link stopped');
    this.emit('finished');
  }

  /** Reconnect delay: backoffMs * 2^attempts, capped at maxBackoffMs */
  calculateBackoff(): number {
    const { backoffMs, maxBackoffMs } = this.options.reconnect;
    return Math.min(backoffMs * Math.pow(2, this.reconnectAttempts), maxBackoffMs);
  }

  get consecutiveReadFailures(): number {
    return this.liveness.consecutiveFailures;
  }

  // --- Socket lifecycle (called by subclasses) ---

  /** Adopt a freshly connected or accepted socket as the active link */
  protected attach(sock: net.Socket): void {
    if (this.exitRequested) {
      sock.destroy();
      return;
    }

    const previous = this.socket;
    if (previous) {
      this.log.warn('New connection replaces the active one');
      this.clearLinkTimers();
      previous.removeAllListeners();
      previous.destroy();
    }

    this.clearReconnectTimer();
    this.socket = sock;
    this.assembler.reset();
    this.liveness.reset();
    this.reconnectAttempts = 0;

    const decoder = new StringDecoder('utf8');
    sock.setNoDelay(true);
    sock.on('data', (chunk: Buffer) => this.onData(sock, decoder.write(chunk)));
    sock.on('end', () => this.dropLink(sock, 'peer closed the connection'));
    sock.on('close', () => this.dropLink(sock, 'socket closed'));
    sock.on('error', (err: Error) => this.dropLink(sock, err.message));

    this.readTimer = setInterval(() => this.onReadPeriod(sock), this.options.connTimeoutMs);
    this.armHeartbeat(sock);

    if (this.everConnected) this.stats.reconnectCount++;
    this.everConnected = true;
    this.stats.connected = true;
    this.stats.lastConnectedAt = Date.now();

    this.setState('active');
    this.log.info({ remote: `${sock.remoteAddress}:${sock.remotePort}` }, 'Link active');
    this.emit('connected');
  }

  /** A connect or listen attempt failed; retry after the backoff delay */
  protected connectFailed(reason: string): void {
    this.stats.lastError = reason;
    this.stats.lastErrorAt = Date.now();
    this.log.warn({ reason }, 'Connection attempt failed');
    this.setState('failed');
    this.scheduleReconnect();
  }

  // --- Internals ---

  private beginOpen(): void {
    if (this.exitRequested) return;
    this.setState('connecting');
    this.open();
  }

  private onData(sock: net.Socket, text: string): void {
    if (this.socket !== sock) return;
    this.liveness.recordData();

    for (const frame of this.assembler.feed(text)) {
      if (this.socket !== sock) return;
      this.stats.framesReceived++;
      this.stats.lastFrameReceivedAt = Date.now();
      this.log.debug({ frame }, 'Received');
      this.emit('frame', frame);
    }
  }

  /** One read-timeout period elapsed */
  private onReadPeriod(sock: net.Socket): void {
    if (this.socket !== sock) return;
    if (this.liveness.recordReadTimeout()) {
      this.dropLink(sock, 'heartbeat timeout');
    }
  }

  /** Heartbeat goes out once nothing was written for the heartbeat interval */
  private armHeartbeat(sock: net.Socket): void {
    if (this.heartbeatTimer) clearTimeout(this.heartbeatTimer);
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = null;
      if (this.socket !== sock) return;
      this.write(sock, HEARTBEAT);
      this.stats.heartbeatsSent++;
    }, heartbeatIntervalMs(this.options));
  }

  private write(sock: net.Socket, data: string): void {
    this.armHeartbeat(sock);
    sock.write(data, (err?: Error | null) => {
      if (err) this.dropLink(sock, `write failed: ${err.message}`);
    });
  }

  /** Dead-link handling shared by timeouts, peer close, socket and write errors */
  private dropLink(sock: net.Socket, reason: string): void {
    if (this.socket !== sock) return;

    this.clearLinkTimers();
    sock.removeAllListeners();
    sock.destroy();
    this.socket = null;
    this.assembler.reset();
    this.liveness.reset();

    this.stats.connected = false;
    this.stats.lastDisconnectedAt = Date.now();
    this.stats.lastError = reason;
    this.stats.lastErrorAt = this.stats.lastDisconnectedAt;

    this.setState('failed');
    this.log.warn({ reason }, 'Link dropped');
    this.emit('disconnected', reason);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.exitRequested || this.reconnectTimer) return;

    const delayMs = this.calculateBackoff();
    this.reconnectAttempts++;
    this.log.info({ attempt: this.reconnectAttempts, delayMs }, 'Reconnect scheduled');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.beginOpen();
    }, delayMs);
  }

  private closeSocket(sock: net.Socket, graceMs: number): Promise<void> {
    sock.removeAllListeners();
    if (graceMs <= 0 || sock.destroyed) {
      sock.destroy();
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => sock.destroy(), graceMs);
      sock.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      // Errors while closing are expected on a broken link
      sock.on('error', (err: Error) => this.log.debug({ err: err.message }, 'Error while closing'));
      sock.end();
    });
  }

  private setState(next: LinkState): void {
    if (this._state === next) return;
    const prev = this._state;
    this._state = next;
    this.emit('stateChange', next, prev);
  }

  private clearLinkTimers(): void {
    if (this.readTimer) {
      clearInterval(this.readTimer);
      this.readTimer = null;
    }
    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
