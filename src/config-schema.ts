/**
 * Config Schema Validation
 *
 * Zod schemas for the trackside-link YAML configuration. Every field has
 * a default, so an empty document is a complete configuration.
 */

import { z } from 'zod';
import { DEFAULT_ENDPOINT_PORT } from './origin/naming';
import { CONN_TIMEOUT_MS, MAX_HEARTBEAT_FAIL } from './link/types';
import { DEFAULT_BLINK_OPTIONS } from './devices/blink-scheduler';
import { DEFAULT_NODE_PORT } from './node/actuator-node';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    // Accept IP addresses, hostnames, and special values
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || val === '0.0.0.0' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const aspectSchema = z.enum(['dark', 'red', 'green', 'flashing-red', 'flashing-green']);

// --- Link ---

const reconnectConfigSchema = z.object({
  backoffMs: z.number().int().min(100).optional(),
  maxBackoffMs: z.number().int().min(100).optional(),
}).refine(
  (r) => r.backoffMs === undefined || r.maxBackoffMs === undefined || r.maxBackoffMs >= r.backoffMs,
  { message: 'maxBackoffMs must not be smaller than backoffMs' }
);

const linkConfigSchema = z.object({
  connTimeoutMs: z.number().int().min(100).default(CONN_TIMEOUT_MS),
  maxHeartbeatFail: z.number().int().min(1).default(MAX_HEARTBEAT_FAIL),
  reconnect: reconnectConfigSchema.optional(),
});

// --- Node ---

const flashingConfigSchema = z.object({
  frequencyHz: z.number().positive().max(50).default(DEFAULT_BLINK_OPTIONS.frequencyHz),
  dutyCycle: z.number().gt(0).lt(1).default(DEFAULT_BLINK_OPTIONS.dutyCycle),
});

const nodeConfigSchema = z.object({
  listenAddress: hostSchema.default('0.0.0.0'),
  port: portSchema.default(DEFAULT_NODE_PORT),
  hardware: z.enum(['simulated']).default('simulated'),
  flashing: flashingConfigSchema.default({}),
});

// --- Bridge ---

const layoutSchema = z.object({
  turnouts: z.array(z.object({
    systemName: z.string().min(1),
    userName: z.string().optional(),
    state: z.enum(['closed', 'thrown', 'unknown']).optional(),
  })).default([]),
  sensors: z.array(z.object({
    systemName: z.string().min(1),
    userName: z.string().optional(),
  })).default([]),
  signalHeads: z.array(z.object({
    systemName: z.string().min(1),
    userName: z.string().optional(),
    aspect: aspectSchema.optional(),
  })).default([]),
});

const bridgeConfigSchema = z.object({
  defaultPort: portSchema.default(DEFAULT_ENDPOINT_PORT),
  connectWaitMs: z.number().int().min(0).default(5000),
  shutdownGraceMs: z.number().int().min(0).default(2000),
  resyncOnReconnect: z.boolean().default(true),
  layout: layoutSchema.default({}),
  startup: z.object({
    aspect: aspectSchema.default('red'),
    closeTurnouts: z.boolean().default(true),
  }).optional(),
  shutdown: z.boolean().default(false),
});

// --- Logging ---

const loggingConfigSchema = z.object({
  verbose: z.boolean().default(false),
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
});

// --- Full Config Schema ---

export const configSchema = z.object({
  link: linkConfigSchema.default({}),
  node: nodeConfigSchema.default({}),
  bridge: bridgeConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// --- Type Exports ---

export type ConfigInput = z.input<typeof configSchema>;
export type ConfigOutput = z.output<typeof configSchema>;

/**
 * Validate a parsed YAML document
 */
export function validateConfig(data: unknown): ConfigOutput {
  return configSchema.parse(data ?? {});
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
