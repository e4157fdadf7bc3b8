/**
 * EndpointRegistry: alias (host:port, lowercase) → Link Manager
 *
 * The only place links for remote endpoints are created and destroyed.
 * A link is created the first time any device references its endpoint
 * and lives until it is removed, even across reconnects.
 */

import { getLogger } from '../logger';
import { LinkManager } from '../link/link-manager';
import { TcpClientLink } from '../link/tcp-client-link';
import { LinkOptions } from '../link/types';

const log = getLogger('Endpoints');

export type LinkFactory = (host: string, port: number) => LinkManager;

export function endpointAlias(host: string, port: number): string {
  return `${host}:${port}`.toLowerCase();
}

export function clientLinkFactory(options?: Partial<LinkOptions>): LinkFactory {
  return (host, port) => new TcpClientLink(host, port, options);
}

export class EndpointRegistry {
  private readonly links = new Map<string, LinkManager>();
  private readonly factory: LinkFactory;

  constructor(factory: LinkFactory = clientLinkFactory()) {
    this.factory = factory;
  }

  /** Return the link for an endpoint, creating it if this is the first reference */
  add(host: string, port: number): LinkManager {
    const alias = endpointAlias(host, port);
    const existing = this.links.get(alias);
    if (existing) return existing;

    const link = this.factory(host, port);
    this.links.set(alias, link);
    log.info({ alias }, 'Endpoint added');
    return link;
  }

  get(alias: string): LinkManager | undefined {
    return this.links.get(alias.toLowerCase());
  }

  has(alias: string): boolean {
    return this.links.has(alias.toLowerCase());
  }

  /**
   * Stop and forget one endpoint. The alias is free again as soon as this
   * is called, so a later add() gets a fresh link.
   */
  async remove(alias: string, graceMs = 0): Promise<boolean> {
    const key = alias.toLowerCase();
    const link = this.links.get(key);
    if (!link) return false;

    this.links.delete(key);
    await link.stop(graceMs);
    log.info({ alias: key }, 'Endpoint removed');
    return true;
  }

  /** Stop every endpoint, each given at most graceMs to close */
  async removeAll(graceMs = 0): Promise<void> {
    const aliases = this.aliases();
    await Promise.all(aliases.map((alias) => this.remove(alias, graceMs)));
  }

  aliases(): string[] {
    return [...this.links.keys()];
  }

  all(): LinkManager[] {
    return [...this.links.values()];
  }

  get size(): number {
    return this.links.size;
  }
}
