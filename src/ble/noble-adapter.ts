/**
 * Noble BLE adapter
 *
 * BleAdapter on top of @abandonware/noble. Noble is a native add-on and an
 * optional dependency, so it is loaded at runtime; a missing or broken build
 * surfaces as BleUnavailableError at startup instead of a crash on import.
 *
 * Only the slice of Noble's API the bridge needs is modelled here.
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { AbortError, BleUnavailableError, ConnectError, errorMessage } from '../errors';
import { NotificationStream } from './notification-stream';
import { advertisesService, matchesDevice, normalizeUuid } from './device-match';
import { BleAdapter, ConnectOptions, DeviceHandle, GattLink, ScanOptions } from './types';

export interface NobleCharacteristic extends EventEmitter {
  readonly uuid: string;
  subscribeAsync(): Promise<void>;
  unsubscribeAsync(): Promise<void>;
}

export interface NoblePeripheral extends EventEmitter {
  readonly id: string;
  readonly address: string;
  readonly rssi: number;
  readonly state: string;
  readonly advertisement: {
    localName?: string;
    serviceUuids?: string[];
  };
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverSomeServicesAndCharacteristicsAsync(
    serviceUuids: string[],
    characteristicUuids: string[],
  ): Promise<{ characteristics: NobleCharacteristic[] }>;
}

export interface NobleModule extends EventEmitter {
  readonly state: string;
  startScanningAsync(serviceUuids?: string[], allowDuplicates?: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
}

function isNobleModule(value: unknown): value is NobleModule {
  return typeof value === 'object'
    && value !== null
    && 'startScanningAsync' in value
    && typeof value.startScanningAsync === 'function'
    && 'on' in value
    && typeof value.on === 'function';
}

/** Load Noble, which also initializes the HCI/CoreBluetooth bindings */
export function loadNoble(): NobleModule {
  let loaded: unknown;
  try {
    loaded = require('@abandonware/noble');
  } catch (err) {
    throw new BleUnavailableError(
      `@abandonware/noble is not available (${errorMessage(err)}); install it or run with --emulate`,
      { cause: err },
    );
  }
  if (!isNobleModule(loaded)) {
    throw new BleUnavailableError('@abandonware/noble did not export the expected API');
  }
  return loaded;
}

interface LinkState {
  peripheral: NoblePeripheral;
  characteristic: NobleCharacteristic | null;
  stream: NotificationStream | null;
  onData: ((data: Buffer) => void) | null;
  onDisconnect: (() => void) | null;
}

function toHandle(peripheral: NoblePeripheral): DeviceHandle {
  return {
    id: peripheral.id,
    address: peripheral.address,
    name: peripheral.advertisement.localName ?? '',
    rssi: peripheral.rssi,
  };
}

/** Race a promise against a timeout and an abort signal */
function withDeadline<T>(promise: Promise<T>, timeoutMs: number, signal: AbortSignal | undefined, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      reject(new Error(`${what} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export class NobleAdapter implements BleAdapter {
  private readonly peripherals = new Map<string, NoblePeripheral>();
  private readonly links = new Map<GattLink, LinkState>();
  private readonly log: Logger;

  constructor(private readonly noble: NobleModule = loadNoble(), logger?: Logger) {
    this.log = logger ?? getLogger('Noble');
  }

  scan(options: ScanOptions): Promise<DeviceHandle | null> {
    const { signal } = options;
    if (signal?.aborted) return Promise.reject(new AbortError());

    return new Promise((resolve, reject) => {
      let settled = false;

      const onDiscover = (peripheral: NoblePeripheral) => {
        const device = toHandle(peripheral);
        if (!advertisesService(peripheral.advertisement.serviceUuids ?? [], options.serviceUuid)) return;
        if (!matchesDevice(options.namePattern, device)) {
          this.log.debug({ device: device.name, id: device.id }, 'Heart-rate sensor does not match pattern');
          return;
        }
        this.peripherals.set(device.id, peripheral);
        finish(() => resolve(device));
      };
      const onAbort = () => finish(() => reject(new AbortError()));
      const timer = setTimeout(() => finish(() => resolve(null)), options.timeoutMs);

      const startScan = () => {
        this.log.debug({ pattern: options.namePattern }, 'Scanning');
        this.noble.startScanningAsync([], false).catch((err: unknown) => finish(() => reject(err)));
      };
      const onStateChange = (state: string) => {
        this.log.info({ state }, 'Bluetooth adapter state');
        if (state === 'poweredOn' && !settled) startScan();
      };

      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.noble.removeListener('discover', onDiscover);
        this.noble.removeListener('stateChange', onStateChange);
        signal?.removeEventListener('abort', onAbort);
        this.noble.stopScanningAsync().catch((err: unknown) => {
          this.log.warn({ error: errorMessage(err) }, 'Failed to stop scanning');
        });
        settle();
      };

      this.noble.on('discover', onDiscover);
      this.noble.on('stateChange', onStateChange);
      signal?.addEventListener('abort', onAbort, { once: true });

      // Noble reports poweredOn asynchronously after load; the scan timeout covers the wait
      if (this.noble.state === 'poweredOn') startScan();
    });
  }

  async connect(device: DeviceHandle, options: ConnectOptions): Promise<GattLink> {
    const peripheral = this.peripherals.get(device.id);
    if (!peripheral) {
      throw new ConnectError(`Device ${device.id} was not discovered by this adapter`);
    }

    try {
      await withDeadline(peripheral.connectAsync(), options.timeoutMs, options.signal, 'Connect');
    } catch (err) {
      await this.safeDisconnect(peripheral);
      this.peripherals.delete(device.id);
      if (options.signal?.aborted) throw err;
      throw new ConnectError(`Connect to ${device.name || device.id} failed: ${errorMessage(err)}`, { cause: err });
    }

    const link: GattLink = { device };
    this.links.set(link, {
      peripheral,
      characteristic: null,
      stream: null,
      onData: null,
      onDisconnect: null,
    });
    return link;
  }

  async subscribe(
    link: GattLink,
    serviceUuid: string,
    characteristicUuid: string,
    options: ConnectOptions,
  ): Promise<NotificationStream> {
    const state = this.links.get(link);
    if (!state) {
      throw new ConnectError(`No open link to ${link.device.id}`);
    }
    const { timeoutMs, signal } = options;

    const wanted = normalizeUuid(characteristicUuid);
    let characteristic: NobleCharacteristic | undefined;
    try {
      const { characteristics } = await withDeadline(
        state.peripheral.discoverSomeServicesAndCharacteristicsAsync([normalizeUuid(serviceUuid)], [wanted]),
        timeoutMs,
        signal,
        'Service discovery',
      );
      characteristic = characteristics.find((c) => normalizeUuid(c.uuid) === wanted);
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ConnectError(`Service discovery failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!characteristic) {
      throw new ConnectError(`Device ${link.device.name || link.device.id} has no characteristic ${characteristicUuid}`);
    }

    const stream = new NotificationStream();
    const onData = (data: Buffer) => stream.push(data);
    const onDisconnect = () => stream.end({ cause: 'adapter-disconnect', detail: 'peripheral disconnected' });

    characteristic.on('data', onData);
    state.peripheral.once('disconnect', onDisconnect);
    state.characteristic = characteristic;
    state.stream = stream;
    state.onData = onData;
    state.onDisconnect = onDisconnect;

    try {
      await withDeadline(characteristic.subscribeAsync(), timeoutMs, signal, 'Subscribe');
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ConnectError(`Subscribe to ${characteristicUuid} failed: ${errorMessage(err)}`, { cause: err });
    }
    return stream;
  }

  async disconnect(link: GattLink): Promise<void> {
    const state = this.links.get(link);
    if (!state) return;
    this.links.delete(link);

    const { peripheral, characteristic, stream, onData, onDisconnect } = state;
    if (characteristic && onData) characteristic.removeListener('data', onData);
    if (onDisconnect) peripheral.removeListener('disconnect', onDisconnect);
    stream?.end({ cause: 'stream-ended' });

    if (characteristic && peripheral.state === 'connected') {
      try {
        await characteristic.unsubscribeAsync();
      } catch (err) {
        this.log.warn({ error: errorMessage(err) }, 'Unsubscribe failed');
      }
    }

    await this.safeDisconnect(peripheral);
    this.peripherals.delete(link.device.id);
  }

  private async safeDisconnect(peripheral: NoblePeripheral): Promise<void> {
    if (peripheral.state === 'disconnected') return;
    try {
      await peripheral.disconnectAsync();
    } catch (err) {
      this.log.warn({ id: peripheral.id, error: errorMessage(err) }, 'Disconnect failed');
    }
  }
}
