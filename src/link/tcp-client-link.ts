/**
 * TCP Client Link
 *
 * Origin side of a link: connects out to an actuator node and retries
 * after the reconnect delay until stopped.
 */

import * as net from 'net';
import { LinkManager } from './link-manager';
import { LinkOptions } from './types';

export class TcpClientLink extends LinkManager {
  private pending: net.Socket | null = null;

  constructor(host: string, port: number, options?: Partial<LinkOptions>) {
    super(`${host}:${port}`.toLowerCase(), 'client', host, port, options);
  }

  protected open(): void {
    this.log.info({ host: this.host, port: this.port }, 'Connecting');

    const sock = net.createConnection({ host: this.host, port: this.port });
    this.pending = sock;
    sock.setTimeout(this.options.connTimeoutMs);

    const fail = (reason: string): void => {
      if (this.pending !== sock) return;
      this.pending = null;
      sock.removeAllListeners();
      sock.destroy();
      this.connectFailed(reason);
    };

    sock.once('connect', () => {
      if (this.pending !== sock) return;
      this.pending = null;
      sock.setTimeout(0);
      sock.removeAllListeners();
      this.attach(sock);
    });
    sock.once('timeout', () => fail('connect timeout'));
    sock.on('error', (err: Error) => fail(err.message));
    sock.once('close', () => fail('closed before connecting'));
  }

  protected async release(): Promise<void> {
    const sock = this.pending;
    if (!sock) return;
    this.pending = null;
    sock.removeAllListeners();
    sock.destroy();
  }
}
