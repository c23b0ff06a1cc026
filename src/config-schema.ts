/**
 * Config Schema Validation
 *
 * Zod schemas for the bridge configuration file. Every field has a default,
 * so an empty file (or no file) yields a working setup.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    // Accept IP addresses, hostnames, and special values
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const oscAddressSchema = z.string().startsWith('/').refine(
  (val) => !/[\s#,]/.test(val),
  { message: 'OSC address must not contain whitespace, "#" or ","' }
);

const uuidSchema = z.string().regex(
  /^([0-9a-fA-F]{4}|[0-9a-fA-F]{8}-?[0-9a-fA-F]{4}-?[0-9a-fA-F]{4}-?[0-9a-fA-F]{4}-?[0-9a-fA-F]{12})$/,
  { message: 'Expected a 16-bit ("180d") or 128-bit Bluetooth UUID' }
);

function isValidPattern(val: string): boolean {
  try {
    new RegExp(val, 'i');
    return true;
  } catch {
    return false;
  }
}

// --- OSC Output ---

const parameterSchema = z.object({
  name: z.string().min(1).regex(/^[A-Za-z0-9_./-]+$/, { message: 'Parameter name may only contain letters, digits, "_", ".", "/" or "-"' }),
  address: oscAddressSchema.optional(),
});

const oscConfigSchema = z.object({
  host: hostSchema.default('127.0.0.1'),
  port: portSchema.default(9000),
  /** "{name}" is replaced by the parameter name */
  addressTemplate: oscAddressSchema.refine(
    (val) => val.includes('{name}'),
    { message: 'addressTemplate must contain "{name}"' }
  ).optional(),
  /** Shorthand for addressTemplate = addressPrefix + "{name}" */
  addressPrefix: oscAddressSchema.optional(),
  parameters: z.object({
    heartRate: parameterSchema.default({ name: 'heartbeat_value' }),
    normalized: parameterSchema.default({ name: 'heartbeat_waittime' }),
  }).default({}),
});

// --- Device Selection ---

const deviceConfigSchema = z.object({
  namePattern: z.string().min(1).refine(isValidPattern, {
    message: 'namePattern is not a valid regular expression',
  }).optional(),
  serviceUuid: uuidSchema.default('180d'),
  characteristicUuid: uuidSchema.default('2a37'),
});

// --- Reconnect Backoff ---

const fixedBackoffSchema = z.object({
  kind: z.literal('fixed'),
  delayMs: z.number().int().min(0),
});

const exponentialBackoffSchema = z.object({
  kind: z.literal('exponential'),
  initialDelayMs: z.number().int().min(0).default(3000),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().int().min(0).default(30000),
});

const backoffSchema = z.discriminatedUnion('kind', [fixedBackoffSchema, exponentialBackoffSchema]).refine(
  (b) => b.kind !== 'exponential' || b.maxDelayMs >= b.initialDelayMs,
  { message: 'maxDelayMs must not be less than initialDelayMs', path: ['maxDelayMs'] }
);

const connectionConfigSchema = z.object({
  scanTimeoutMs: z.number().int().min(100).default(10000),
  connectTimeoutMs: z.number().int().min(100).default(20000),
  /** A single malformed frame is never fatal */
  maxConsecutiveMalformed: z.number().int().min(2).default(3),
  backoff: backoffSchema.default({ kind: 'exponential' }),
  /** Wait after a scan that found no sensor */
  scanRetryDelayMs: z.number().int().min(0).default(5000),
  /** Failed attempts on the last streaming device before scanning for any sensor again */
  sameDeviceRetries: z.number().int().min(0).default(5),
});

// --- Normalization ---

const linearMappingSchema = z.object({
  kind: z.literal('linear'),
  minBpm: z.number().min(0).default(40),
  maxBpm: z.number().positive().default(180),
});

const beatPeriodMappingSchema = z.object({
  kind: z.literal('beat-period'),
  baseSeconds: z.number().positive().default(0.2),
  flexSeconds: z.number().min(0).default(0.2),
});

/** A mapping without "kind" is a linear range */
const normalizationSchema = z.preprocess(
  (val) => (typeof val === 'object' && val !== null && !Array.isArray(val) && !('kind' in val)
    ? { ...val, kind: 'linear' }
    : val),
  z.discriminatedUnion('kind', [linearMappingSchema, beatPeriodMappingSchema]).refine(
    (m) => m.kind !== 'linear' || m.maxBpm > m.minBpm,
    { message: 'maxBpm must be greater than minBpm', path: ['maxBpm'] }
  ),
);

// --- Logging ---

const loggingConfigSchema = z.object({
  verbose: z.boolean().default(false),
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
});

// --- Full Bridge Config Schema ---

export const bridgeConfigSchema = z.object({
  osc: oscConfigSchema.default({}),
  device: deviceConfigSchema.default({}),
  connection: connectionConfigSchema.default({}),
  normalization: normalizationSchema.default({ kind: 'linear' }),
  logging: loggingConfigSchema.default({}),
});

// --- Type Exports ---

export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>;
export type BridgeConfigOutput = z.output<typeof bridgeConfigSchema>;

/**
 * Validate bridge config
 */
export function validateBridgeConfig(data: unknown): BridgeConfigOutput {
  return bridgeConfigSchema.parse(data);
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
