/**
 * HeartRateEmulator: a virtual heart-rate sensor
 *
 * Implements BleAdapter so the supervisor sees no difference between a real
 * strap and the emulator. Advertises a single device, answers connects
 * immediately and sends a Heart Rate Measurement notification every
 * intervalMs. Set disconnectAfterFrames to drop the link periodically and
 * watch the reconnect cycle.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { AbortError, ConnectError } from '../errors';
import { BleAdapter, ConnectOptions, DeviceHandle, GattLink, ScanOptions } from '../ble/types';
import { NotificationStream } from '../ble/notification-stream';
import { advertisesService, matchesDevice, normalizeUuid } from '../ble/device-match';
import {
  HEART_RATE_MEASUREMENT_UUID,
  HEART_RATE_SERVICE_UUID,
  SensorContact,
  encodeHeartRateMeasurement,
} from '../heart-rate/measurement';

export interface HeartRateEmulatorOptions {
  deviceName?: string;
  deviceId?: string;
  /** Time between notifications */
  intervalMs?: number;
  /** Delay before the device shows up in a scan */
  scanDelayMs?: number;
  /** bpm for the n-th frame of a subscription */
  bpm?: (frame: number) => number;
  sensorContact?: SensorContact;
  /** Drop the link after this many frames (0 = never) */
  disconnectAfterFrames?: number;
  logger?: Logger;
}

/** Slow oscillation between 60 and 120 bpm, one cycle per minute at 1 Hz */
export function defaultBpm(frame: number): number {
  return Math.round(90 + 30 * Math.sin((2 * Math.PI * frame) / 60));
}

interface EmulatedLink {
  stream: NotificationStream | null;
  timer: ReturnType<typeof setInterval> | null;
}

export class HeartRateEmulator implements BleAdapter {
  readonly device: DeviceHandle;

  private readonly intervalMs: number;
  private readonly scanDelayMs: number;
  private readonly bpm: (frame: number) => number;
  private readonly sensorContact: SensorContact;
  private readonly disconnectAfterFrames: number;
  private readonly links = new Map<GattLink, EmulatedLink>();
  private readonly log: Logger;
  private _connectCount = 0;
  private _framesSent = 0;

  constructor(options: HeartRateEmulatorOptions = {}) {
    const id = options.deviceId ?? 'emulated-hrm-0001';
    this.device = { id, address: id, name: options.deviceName ?? 'HRM-Emulator', rssi: -50 };
    this.intervalMs = options.intervalMs ?? 1000;
    this.scanDelayMs = options.scanDelayMs ?? 0;
    this.bpm = options.bpm ?? defaultBpm;
    this.sensorContact = options.sensorContact ?? 'detected';
    this.disconnectAfterFrames = options.disconnectAfterFrames ?? 0;
    this.log = options.logger ?? getLogger('Emulator');
  }

  /** Connections accepted so far */
  get connectCount(): number {
    return this._connectCount;
  }

  /** Frames sent across all subscriptions */
  get framesSent(): number {
    return this._framesSent;
  }

  /** Links that have not been released */
  get openLinks(): number {
    return this.links.size;
  }

  scan(options: ScanOptions): Promise<DeviceHandle | null> {
    const visible = advertisesService([HEART_RATE_SERVICE_UUID], options.serviceUuid)
      && matchesDevice(options.namePattern, this.device);
    const waitMs = visible ? Math.min(this.scanDelayMs, options.timeoutMs) : options.timeoutMs;

    return new Promise((resolve, reject) => {
      const { signal } = options;
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
        if (visible) this.log.info({ device: this.device.name }, 'Advertising');
        resolve(visible ? this.device : null);
      }, waitMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async connect(device: DeviceHandle, options: ConnectOptions): Promise<GattLink> {
    if (options.signal?.aborted) throw new AbortError();
    if (device.id !== this.device.id) {
      throw new ConnectError(`Unknown emulated device ${device.id}`);
    }
    this._connectCount++;
    const link: GattLink = { device };
    this.links.set(link, { stream: null, timer: null });
    this.log.info({ device: device.name, connection: this._connectCount }, 'Connected');
    return link;
  }

  async subscribe(
    link: GattLink,
    serviceUuid: string,
    characteristicUuid: string,
    options: ConnectOptions,
  ): Promise<NotificationStream> {
    if (options.signal?.aborted) throw new AbortError();
    const state = this.links.get(link);
    if (!state) throw new ConnectError('Link is not open');
    if (normalizeUuid(serviceUuid) !== HEART_RATE_SERVICE_UUID
      || normalizeUuid(characteristicUuid) !== HEART_RATE_MEASUREMENT_UUID) {
      throw new ConnectError(`Emulator has no characteristic ${characteristicUuid} in service ${serviceUuid}`);
    }

    const stream = new NotificationStream();
    let frame = 0;
    state.stream = stream;
    state.timer = setInterval(() => {
      stream.push(encodeHeartRateMeasurement({
        heartRateBpm: this.bpm(frame),
        sensorContact: this.sensorContact,
      }));
      frame++;
      this._framesSent++;

      if (this.disconnectAfterFrames > 0 && frame >= this.disconnectAfterFrames) {
        this.stopTimer(state);
        this.log.info({ frames: frame }, 'Simulating link loss');
        stream.end({ cause: 'adapter-disconnect', detail: 'emulated link loss' });
      }
    }, this.intervalMs);

    return stream;
  }

  async disconnect(link: GattLink): Promise<void> {
    const state = this.links.get(link);
    if (!state) return;
    this.links.delete(link);
    this.stopTimer(state);
    state.stream?.end({ cause: 'stream-ended' });
    this.log.info({ device: link.device.name }, 'Disconnected');
  }

  private stopTimer(state: EmulatedLink): void {
    if (state.timer) {
      clearInterval(state.timer);
      state.timer = null;
    }
  }
}
