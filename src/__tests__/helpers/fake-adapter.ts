import { setImmediate as tick } from 'node:timers/promises';
import pino from 'pino';
import { AbortError, TransportUnavailableError } from '../../errors';
import { BleAdapter, ConnectOptions, DeviceHandle, GattLink, ScanOptions } from '../../ble/types';
import { NotificationStream, StreamEndReason } from '../../ble/notification-stream';
import { ParameterKind } from '../../osc/emitter';

export const silentLogger = pino({ level: 'silent' });

export const testDevice: DeviceHandle = {
  id: 'hrm-test-01',
  address: 'aa:bb:cc:dd:ee:01',
  name: 'Test Strap',
};

export const frame = (...values: number[]) => Uint8Array.from(values);

/**
 * Scripted BleAdapter: every subscription replays `frames`, then ends with
 * `endWith`. An array entry is pushed back to back without yielding.
 */
export class FakeAdapter implements BleAdapter {
  scanResult: DeviceHandle | null | Error = testDevice;
  scanHangs = false;
  connectError: Error | null = null;
  subscribeError: Error | null = null;
  subscribeHangs = false;
  frames: Array<Uint8Array | Uint8Array[]> = [];
  endWith: StreamEndReason | null = { cause: 'adapter-disconnect', detail: 'gone' };

  calls: string[] = [];
  scanPatterns: Array<string | undefined> = [];
  disconnects = 0;
  feeding: Promise<void> = Promise.resolve();
  private current: NotificationStream | null = null;

  async scan(options: ScanOptions): Promise<DeviceHandle | null> {
    this.calls.push('scan');
    this.scanPatterns.push(options.namePattern);
    if (this.scanHangs) {
      return new Promise<DeviceHandle | null>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new AbortError()), { once: true });
      });
    }
    if (this.scanResult instanceof Error) throw this.scanResult;
    return this.scanResult;
  }

  async connect(device: DeviceHandle, _options: ConnectOptions): Promise<GattLink> {
    this.calls.push('connect');
    if (this.connectError) throw this.connectError;
    return { device };
  }

  async subscribe(
    _link: GattLink,
    _serviceUuid: string,
    _characteristicUuid: string,
    _options: ConnectOptions,
  ): Promise<NotificationStream> {
    this.calls.push('subscribe');
    if (this.subscribeError) throw this.subscribeError;
    if (this.subscribeHangs) return new Promise<NotificationStream>(() => undefined);
    const stream = new NotificationStream();
    this.current = stream;
    this.feeding = this.feed(stream);
    return stream;
  }

  async disconnect(_link: GattLink): Promise<void> {
    this.calls.push('disconnect');
    this.disconnects++;
    this.current?.end({ cause: 'stream-ended' });
  }

  /** One frame per macrotask, so the consumer has taken each before the next arrives */
  private async feed(stream: NotificationStream): Promise<void> {
    for (const entry of this.frames) {
      await tick();
      for (const f of Array.isArray(entry) ? entry : [entry]) stream.push(f);
    }
    await tick();
    if (this.endWith) stream.end(this.endWith);
  }
}

export class RecordingPublisher {
  published: Array<[ParameterKind, number]> = [];
  /** Kinds that fail on every publish */
  failing = new Set<ParameterKind>();
  /** Kind whose next publish fails, once */
  failOnce: ParameterKind | null = null;
  /** Called after each successful publish */
  onPublish: ((parameter: ParameterKind) => void) | null = null;

  async publish(parameter: ParameterKind, value: number): Promise<void> {
    if (this.failOnce === parameter) {
      this.failOnce = null;
      throw new TransportUnavailableError(`${parameter} receiver unreachable`);
    }
    if (this.failing.has(parameter)) {
      throw new TransportUnavailableError(`${parameter} receiver unreachable`);
    }
    this.published.push([parameter, value]);
    this.onPublish?.(parameter);
  }
}
