/**
 * TCP Server Link
 *
 * Node side of a link: listens and adopts each incoming connection.
 * A second connection replaces the first wholesale, since it means the
 * origin reconnected before our liveness check noticed the old one was gone.
 */

import * as net from 'net';
import { LinkManager } from './link-manager';
import { LinkOptions } from './types';

export class TcpServerLink extends LinkManager {
  private server: net.Server | null = null;

  constructor(port: number, options?: Partial<LinkOptions>, listenAddress = '0.0.0.0') {
    super(`${listenAddress}:${port}`, 'server', listenAddress, port, options);
  }

  /** Actual bound port (differs from `port` when listening on 0) */
  listeningPort(): number | null {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr.port : null;
  }

  protected open(): void {
    if (this.server) {
      this.log.info('Waiting for a new connection');
      return;
    }

    const server = net.createServer((sock) => {
      if (this.server !== server) {
        sock.destroy();
        return;
      }
      this.log.info({ remote: `${sock.remoteAddress}:${sock.remotePort}` }, 'Incoming connection');
      this.attach(sock);
    });
    this.server = server;

    server.on('error', (err: Error) => {
      if (this.server !== server) return;
      this.server = null;
      server.close();
      this.connectFailed(`listen failed: ${err.message}`);
    });

    server.listen(this.port, this.host, () => {
      this.log.info({ address: this.host, port: this.listeningPort() }, 'Listening');
      this.emit('listening', this.listeningPort());
    });
  }

  protected release(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
