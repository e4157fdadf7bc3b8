/**
 * Layout naming convention
 *
 * Entities driven through a node carry their wiring in their name:
 *
 *   IT.RPI$<servo>[<thrown>][<closed>]:<host>[:<port>]        turnout (system name)
 *   IS.RPI$<gpio>:<host>[:<port>]                             sensor (system name)
 *   IH.RPI$<head>$<board>$R<red>$G<green>:<host>[:<port>]     signal head (user name)
 *
 * Parsers return null for names outside the convention and throw
 * ProtocolError for names that use a prefix but are malformed.
 */

import { ProtocolError } from '../errors';
import {
  SignalHeadSpec,
  TurnoutSpec,
  parseGpio,
  parseSignalHeadSpec,
  parseTurnoutSpec,
} from '../protocol/commands';
import { endpointAlias } from '../registry/endpoint-registry';

export const TURNOUT_PREFIX = 'IT.RPI$';
export const SENSOR_PREFIX = 'IS.RPI$';
export const SIGNAL_HEAD_PREFIX = 'IH.RPI$';

/** Port the bridge connects to when a name does not give one */
export const DEFAULT_ENDPOINT_PORT = 10000;

export interface EndpointAddress {
  host: string;
  port: number;
  alias: string;
}

export interface TurnoutAddress extends TurnoutSpec {
  endpoint: EndpointAddress;
}

export interface SensorAddress {
  gpio: number;
  endpoint: EndpointAddress;
}

export interface SignalHeadAddress extends SignalHeadSpec {
  endpoint: EndpointAddress;
}

const HOST_CHARS = /^[A-Za-z0-9.-]+$/;
const DECIMAL = /^[0-9]+$/;

export function parseTurnoutName(name: string, defaultPort = DEFAULT_ENDPOINT_PORT): TurnoutAddress | null {
  const body = stripPrefix(name, TURNOUT_PREFIX);
  if (body === null) return null;
  const [wiring, ...endpoint] = body.split(':');
  return { ...parseTurnoutSpec(wiring), endpoint: parseEndpoint(endpoint, defaultPort, name) };
}

export function parseSensorName(name: string, defaultPort = DEFAULT_ENDPOINT_PORT): SensorAddress | null {
  const body = stripPrefix(name, SENSOR_PREFIX);
  if (body === null) return null;
  const [gpio, ...endpoint] = body.split(':');
  return { gpio: parseGpio(gpio), endpoint: parseEndpoint(endpoint, defaultPort, name) };
}

export function parseSignalHeadName(name: string, defaultPort = DEFAULT_ENDPOINT_PORT): SignalHeadAddress | null {
  const body = stripPrefix(name, SIGNAL_HEAD_PREFIX);
  if (body === null) return null;
  const [wiring, ...endpoint] = body.split(':');
  return { ...parseSignalHeadSpec(wiring), endpoint: parseEndpoint(endpoint, defaultPort, name) };
}

/** Canonical system name for a sensor on an endpoint */
export function sensorSystemName(gpio: number, endpoint: Pick<EndpointAddress, 'host' | 'port'>): string {
  return `${SENSOR_PREFIX}${gpio}:${endpoint.host.toUpperCase()}:${endpoint.port}`;
}

function stripPrefix(name: string, prefix: string): string | null {
  if (name.slice(0, prefix.length).toUpperCase() !== prefix) return null;
  return name.slice(prefix.length);
}

function parseEndpoint(tokens: string[], defaultPort: number, name: string): EndpointAddress {
  if (tokens.length < 1 || tokens.length > 2) {
    throw new ProtocolError('invalid-endpoint', `Expected <host>[:<port>] in ${name}`);
  }
  const host = tokens[0];
  if (!HOST_CHARS.test(host)) {
    throw new ProtocolError('invalid-endpoint', `Invalid host "${host}" in ${name}`);
  }

  let port = defaultPort;
  if (tokens.length === 2) {
    port = DECIMAL.test(tokens[1]) ? Number.parseInt(tokens[1], 10) : 0;
    if (port < 1 || port > 65535) {
      throw new ProtocolError('invalid-endpoint', `Invalid port "${tokens[1]}" in ${name}`);
    }
  }

  return { host, port, alias: endpointAlias(host, port) };
}
