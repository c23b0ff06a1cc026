/**
 * Configuration loader
 *
 * Reads a YAML config file (JSON is valid YAML, so config.json works too),
 * validates it and returns an immutable BridgeConfig. The config is built
 * once at startup and passed explicitly to the supervisor.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { ConfigurationError, errorMessage } from './errors';
import { LogLevel } from './logger';
import { DEFAULT_ADDRESS_TEMPLATE, OscOutputConfig } from './osc/emitter';
import { NormalizationMapping } from './heart-rate/normalizer';
import { SupervisorConfig } from './supervisor/bridge-supervisor';
import { BridgeConfigOutput, formatZodError, validateBridgeConfig } from './config-schema';

/** Runtime config used by the bridge */
export interface BridgeConfig extends SupervisorConfig {
  osc: OscOutputConfig;
  normalization: NormalizationMapping;
  logging: {
    level: LogLevel;
    pretty?: boolean;
  };
}

export interface LoadedConfig {
  config: BridgeConfig;
  /** File the config came from, null when running on defaults */
  source: string | null;
}

/** Looked up in the working directory when no path is given */
export const CONFIG_FILE_NAMES = ['config.yml', 'config.yaml', 'config.json'];

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function resolveTemplate(osc: BridgeConfigOutput['osc']): string {
  if (osc.addressTemplate) return osc.addressTemplate;
  if (osc.addressPrefix) {
    const prefix = osc.addressPrefix.endsWith('/') ? osc.addressPrefix : `${osc.addressPrefix}/`;
    return `${prefix}{name}`;
  }
  return DEFAULT_ADDRESS_TEMPLATE;
}

/**
 * Validate parsed config data and normalize it into a frozen BridgeConfig.
 * Throws ConfigurationError listing every invalid field.
 */
export function parseConfig(data: unknown): BridgeConfig {
  let validated: BridgeConfigOutput;
  try {
    validated = validateBridgeConfig(data ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }

  const { osc, device, connection, normalization, logging } = validated;

  const config: BridgeConfig = {
    osc: {
      host: osc.host,
      port: osc.port,
      addressTemplate: resolveTemplate(osc),
      parameters: {
        heartRate: osc.parameters.heartRate,
        normalized: osc.parameters.normalized,
      },
    },
    device: {
      namePattern: device.namePattern,
      serviceUuid: device.serviceUuid,
      characteristicUuid: device.characteristicUuid,
    },
    connection: {
      scanTimeoutMs: connection.scanTimeoutMs,
      connectTimeoutMs: connection.connectTimeoutMs,
      maxConsecutiveMalformed: connection.maxConsecutiveMalformed,
      backoff: connection.backoff,
      scanRetryDelayMs: connection.scanRetryDelayMs,
      sameDeviceRetries: connection.sameDeviceRetries,
    },
    normalization,
    logging: {
      level: logging.level ?? (logging.verbose ? 'debug' : 'info'),
      pretty: logging.pretty,
    },
  };

  return deepFreeze(config);
}

/** Read and validate one config file */
export function loadConfigFile(filePath: string): BridgeConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML/JSON in ${filePath}: ${errorMessage(err)}`);
  }

  try {
    return parseConfig(parsed);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`${filePath}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Load config from an explicit path, or from the first of
 * CONFIG_FILE_NAMES found in `cwd`. Falls back to defaults when there is none.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): LoadedConfig {
  if (configPath) {
    const resolved = path.resolve(cwd, configPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`Config file not found: ${resolved}`);
    }
    return { config: loadConfigFile(resolved), source: resolved };
  }

  const found = CONFIG_FILE_NAMES
    .map((name) => path.join(cwd, name))
    .find((candidate) => fs.existsSync(candidate));

  if (!found) {
    return { config: parseConfig({}), source: null };
  }
  return { config: loadConfigFile(found), source: found };
}
