/**
 * Configuration loader
 *
 * Reads the YAML config shared by both programs: the `node` section is
 * used on the embedded host, the `bridge` section on the layout host,
 * `link` and `logging` by both.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { LogLevel, getLogger } from './logger';
import { errorMessage } from './errors';
import { LinkOptions, resolveLinkOptions } from './link/types';
import { BlinkOptions } from './devices/blink-scheduler';
import { BridgeOptions } from './origin/bridge';
import { LayoutDefinition } from './origin/memory-layout';
import { ConfigOutput, formatZodError, validateConfig } from './config-schema';

const log = getLogger('Config');

export const DEFAULT_CONFIG_FILE = 'config.yml';

export interface NodeConfig {
  listenAddress: string;
  port: number;
  hardware: 'simulated';
  flashing: BlinkOptions;
}

export interface BridgeConfig extends BridgeOptions {
  layout: LayoutDefinition;
}

/** Runtime config used by the node and bridge programs */
export interface Config {
  link: LinkOptions;
  node: NodeConfig;
  bridge: BridgeConfig;
  logging: {
    verbose: boolean;
    level?: LogLevel;
    pretty?: boolean;
  };
}

/**
 * Load and validate config from YAML. A missing file means all defaults.
 */
export function loadConfig(configPath?: string): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    log.info({ path: resolvedPath }, 'No config file found, using defaults');
    return buildConfig(validateConfig({}));
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(raw, resolvedPath);
}

/** Parse and validate a YAML document */
export function parseConfig(raw: string, source = 'config'): Config {
  let document: unknown;
  try {
    document = parse(raw);
  } catch (error) {
    throw new Error(`[Config] ${source} is not valid YAML: ${errorMessage(error)}`);
  }

  let validated: ConfigOutput;
  try {
    validated = validateConfig(document);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }

  const config = buildConfig(validated);
  log.info({
    source,
    turnouts: config.bridge.layout.turnouts?.length ?? 0,
    sensors: config.bridge.layout.sensors?.length ?? 0,
    signalHeads: config.bridge.layout.signalHeads?.length ?? 0,
  }, 'Config loaded');
  return config;
}

function buildConfig(validated: ConfigOutput): Config {
  const { connTimeoutMs, maxHeartbeatFail, reconnect } = validated.link;
  const backoffMs = reconnect?.backoffMs ?? connTimeoutMs;

  return {
    link: resolveLinkOptions({
      connTimeoutMs,
      maxHeartbeatFail,
      reconnect: {
        backoffMs,
        maxBackoffMs: reconnect?.maxBackoffMs ?? Math.max(backoffMs, connTimeoutMs),
      },
    }),
    node: {
      listenAddress: validated.node.listenAddress,
      port: validated.node.port,
      hardware: validated.node.hardware,
      flashing: { ...validated.node.flashing },
    },
    bridge: {
      defaultPort: validated.bridge.defaultPort,
      connectWaitMs: validated.bridge.connectWaitMs,
      shutdownGraceMs: validated.bridge.shutdownGraceMs,
      resyncOnReconnect: validated.bridge.resyncOnReconnect,
      startup: validated.bridge.startup ?? null,
      shutdownSequence: validated.bridge.shutdown,
      layout: validated.bridge.layout,
    },
    logging: {
      verbose: validated.logging.verbose,
      level: validated.logging.level,
      pretty: validated.logging.pretty,
    },
  };
}
