#!/usr/bin/env node

/**
 * trackside-link
 *
 * Self-healing framed TCP link between a model railroad layout and the
 * embedded hosts that drive its turnouts, signal heads and sensors.
 *
 *   node    runs on the embedded host: listens for the layout host and
 *           drives the hardware
 *   bridge  runs on the layout host: connects to every node named in the
 *           layout and keeps it in step with the layout's state
 *
 * Usage:
 *   trackside-link node                     # config.yml in current directory
 *   trackside-link node --port 14300        # override the listen port
 *   trackside-link bridge --config ./my.yml # use a specific config file
 *   trackside-link bridge --verbose         # debug logging
 */

import { initLogger, getLogger } from './logger';
import { Config, loadConfig } from './config';
import { errorMessage } from './errors';
import { formatLinkStats, LinkStats } from './link-stats';
import { ActuatorNode } from './node/actuator-node';
import { SimulatedBackend } from './hardware/simulated-backend';
import { LayoutBridge } from './origin/bridge';
import { MemoryLayout } from './origin/memory-layout';
import { EndpointRegistry, clientLinkFactory } from './registry/endpoint-registry';

export { LinkManager } from './link/link-manager';
export { TcpClientLink } from './link/tcp-client-link';
export { TcpServerLink } from './link/tcp-server-link';
export { CommandDispatcher } from './protocol/dispatcher';
export * from './protocol/commands';
export { ActuatorNode } from './node/actuator-node';
export { LayoutBridge } from './origin/bridge';
export { MemoryLayout } from './origin/memory-layout';
export { EndpointRegistry } from './registry/endpoint-registry';
export { SimulatedBackend } from './hardware/simulated-backend';

const log = getLogger('Main');

/** Grace period for the node's link when stopping */
const NODE_STOP_GRACE_MS = 2000;
const STATUS_INTERVAL_MS = 60_000;

export type Mode = 'node' | 'bridge';

export interface CliOptions {
  mode: Mode | null;
  configPath?: string;
  port?: number;
  verbose: boolean;
  help: boolean;
}

interface Running {
  stop(): Promise<void>;
  status(): LinkStats[];
}

function printBanner(): void {
  console.log('');
  console.log('  trackside-link');
  console.log('  Turnouts, signal heads and sensors over a self-healing TCP link');
  console.log('');
}

function printUsage(): void {
  console.log('  Usage:');
  console.log('    trackside-link node   [options]   Drive hardware for the layout host');
  console.log('    trackside-link bridge [options]   Connect the layout to its nodes');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./config.yml)');
  console.log('    --port, -p <port>     Node listen port (default 14200)');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --help, -h            Show this help');
  console.log('');
}

/** Parse process.argv. Throws on unknown arguments. */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { mode: null, verbose: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case 'node':
      case 'bridge':
        if (options.mode) throw new Error(`Only one mode may be given, got ${options.mode} and ${arg}`);
        options.mode = arg;
        break;
      case '--config':
      case '-c':
        options.configPath = argv[++i];
        if (!options.configPath) throw new Error('--config requires a file path');
        break;
      case '--port':
      case '-p':
        {
          const value = argv[++i];
          const port = value !== undefined && /^[0-9]+$/.test(value) ? parseInt(value, 10) : NaN;
          if (!(port >= 1 && port <= 65535)) throw new Error(`--port requires a port number, got ${value}`);
          options.port = port;
        }
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (options.port !== undefined && options.mode === 'bridge') {
    throw new Error('--port applies to node mode only');
  }
  return options;
}

function startNode(config: Config): Running {
  log.warn('No hardware driver installed, using simulated hardware');
  const node = new ActuatorNode({
    backend: new SimulatedBackend(),
    port: config.node.port,
    listenAddress: config.node.listenAddress,
    link: config.link,
    flashing: config.node.flashing,
  });
  node.start();
  return {
    stop: () => node.stop(NODE_STOP_GRACE_MS),
    status: () => [node.getStatus().link],
  };
}

function startBridge(config: Config): Running {
  const layout = MemoryLayout.fromDefinition(config.bridge.layout);
  const bridge = new LayoutBridge(layout, config.bridge, new EndpointRegistry(clientLinkFactory(config.link)));
  bridge.start();
  if (bridge.getStatus().length === 0) {
    log.warn('No layout entity names a node, nothing to connect to');
  }
  return {
    stop: () => bridge.stop(),
    status: () => bridge.getStatus().map((s) => s.link),
  };
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv);
  } catch (err) {
    console.error(`[Error] ${errorMessage(err)}`);
    printUsage();
    process.exit(1);
  }

  if (options.help || !options.mode) {
    printBanner();
    printUsage();
    process.exit(options.help ? 0 : 1);
  }

  let config: Config;
  try {
    config = loadConfig(options.configPath);
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
  if (options.port !== undefined) config.node.port = options.port;

  const verbose = options.verbose || config.logging.verbose;
  initLogger({ level: verbose ? 'debug' : config.logging.level, pretty: config.logging.pretty });

  printBanner();
  const running = options.mode === 'node' ? startNode(config) : startBridge(config);

  const statusTimer = setInterval(() => {
    for (const stats of running.status()) log.info(formatLinkStats(stats));
  }, STATUS_INTERVAL_MS);
  statusTimer.unref();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    clearInterval(statusTimer);
    log.info({ signal }, 'Shutting down');
    running.stop().then(
      () => {
        for (const stats of running.status()) log.info(formatLinkStats(stats));
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`[Fatal] ${errorMessage(err)}`);
    process.exit(1);
  });
}
