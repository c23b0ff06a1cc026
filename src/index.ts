#!/usr/bin/env node

/**
 * Heart-rate OSC bridge
 *
 * Streams a BLE heart-rate sensor (GATT Heart Rate service) to an OSC
 * receiver such as an avatar application:
 *
 *   /avatar/parameters/heartbeat_value     int    bpm
 *   /avatar/parameters/heartbeat_waittime  float  0.0-1.0
 *
 * Usage:
 *   hrs-osc-bridge                   # Use config.yml / config.json in current directory
 *   hrs-osc-bridge --config my.yml   # Use a specific config file
 *   hrs-osc-bridge --verbose         # Log every reading
 *   hrs-osc-bridge --emulate         # Use a virtual sensor instead of Bluetooth
 */

import { Logger } from 'pino';
import { loadConfig, BridgeConfig } from './config';
import { initLogger } from './logger';
import { BleUnavailableError, ConfigurationError, errorMessage } from './errors';
import { BleAdapter } from './ble/types';
import { NobleAdapter, loadNoble } from './ble/noble-adapter';
import { HeartRateEmulator } from './emulators/heart-rate-emulator';
import { createNormalizer } from './heart-rate/normalizer';
import { OscEmitter } from './osc/emitter';
import { UdpOscTransport } from './osc/udp-transport';
import { BridgeSupervisor } from './supervisor/bridge-supervisor';

export interface CliOptions {
  configPath?: string;
  verbose: boolean;
  emulate: boolean;
  help: boolean;
}

function printHelp(): void {
  console.log('');
  console.log('  hrs-osc-bridge');
  console.log('  BLE heart-rate sensor to OSC bridge');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML/JSON file');
  console.log('    --verbose, -v         Log every reading (debug level)');
  console.log('    --emulate             Use a virtual heart-rate sensor');
  console.log('    --help, -h            Show this help');
  console.log('');
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { verbose: false, emulate: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c': {
        const value = argv[++i];
        if (!value) {
          throw new ConfigurationError('--config requires a file path (e.g. --config config.yml)');
        }
        options.configPath = value;
        break;
      }
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--emulate':
        options.emulate = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function createAdapter(options: CliOptions): BleAdapter {
  return options.emulate ? new HeartRateEmulator() : new NobleAdapter(loadNoble());
}

async function main(): Promise<number> {
  const options = parseArgs(process.argv);
  if (options.help) {
    printHelp();
    return 0;
  }

  const { config, source } = loadConfig(options.configPath);
  const log = initLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  }).child({ module: 'Bridge' });

  const normalizer = createNormalizer(config.normalization);
  const adapter = createAdapter(options);
  const transport = new UdpOscTransport();
  await transport.open();
  const emitter = new OscEmitter(config.osc, transport);

  logStartup(log, config, source, emitter, options);

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    log.info({ signal }, 'Shutting down');
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const supervisor = new BridgeSupervisor(config, { adapter, emitter, normalizer });
  try {
    await supervisor.run(controller.signal);
  } finally {
    transport.close();
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
  }
  return 0;
}

function logStartup(
  log: Logger,
  config: BridgeConfig,
  source: string | null,
  emitter: OscEmitter,
  options: CliOptions,
): void {
  log.info({ config: source ?? '(defaults)' }, 'Configuration loaded');
  log.info({
    host: config.osc.host,
    port: config.osc.port,
    heartRate: emitter.addressOf('heartRate'),
    normalized: emitter.addressOf('normalized'),
  }, 'OSC output');
  log.info({
    pattern: config.device.namePattern ?? '(any heart-rate sensor)',
    adapter: options.emulate ? 'emulator' : 'noble',
  }, 'Sensor selection');
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      if (err instanceof ConfigurationError || err instanceof BleUnavailableError) {
        console.error(`[Error] ${err.message}`);
      } else {
        console.error(`[Fatal] ${errorMessage(err)}`);
      }
      process.exit(1);
    },
  );
}
