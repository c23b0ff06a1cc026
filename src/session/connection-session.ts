/**
 * ConnectionSession
 *
 * Owns one attempt at talking to a heart-rate sensor: scan, connect,
 * subscribe, then decode and publish every notification until the link
 * ends. The session never retries; it reports a terminal state and the
 * BridgeSupervisor decides what happens next.
 *
 * Notifications are handled strictly one at a time. Both OSC messages for a
 * reading are sent before the next frame is taken, so the receiver sees the
 * sensor's own ordering.
 *
 * Events:
 *   'stateChange' (next: ConnectionState, prev: ConnectionState)
 *   'reading'     (reading: SensorReading, normalized: NormalizedValue)
 */

import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { AbortError, ScanTimeoutError, TransportUnavailableError, errorMessage } from '../errors';
import { BleAdapter, DeviceHandle, GattLink } from '../ble/types';
import { NotificationStream } from '../ble/notification-stream';
import { SensorReading, decodeSensorReading } from '../heart-rate/measurement';
import { Normalizer } from '../heart-rate/normalizer';
import { OscEmitter, ParameterKind } from '../osc/emitter';
import { SessionStats, createSessionStats } from './session-stats';
import {
  ConnectionState,
  DisconnectReason,
  TerminalState,
  describeState,
  transition,
} from './connection-state';

export interface SessionConfig {
  device: {
    namePattern?: string;
    serviceUuid: string;
    characteristicUuid: string;
  };
  connection: {
    scanTimeoutMs: number;
    connectTimeoutMs: number;
    /** Consecutive malformed frames that end the session */
    maxConsecutiveMalformed: number;
  };
}

export type Publisher = Pick<OscEmitter, 'publish'>;

export interface SessionDeps {
  adapter: BleAdapter;
  emitter: Publisher;
  normalizer: Normalizer;
  /** Monotonic clock for reading timestamps */
  clock?: () => number;
  logger?: Logger;
}

export interface SessionOutcome {
  state: TerminalState;
  reachedSubscribed: boolean;
  stats: SessionStats;
}

/** Settle with the promise, or reject with AbortError as soon as the signal fires */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export class ConnectionSession extends EventEmitter {
  private _state: ConnectionState = { kind: 'idle' };
  private readonly config: SessionConfig;
  private readonly adapter: BleAdapter;
  private readonly emitter: Publisher;
  private readonly normalizer: Normalizer;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly stats: SessionStats = createSessionStats();
  private reachedSubscribed = false;

  constructor(config: SessionConfig, deps: SessionDeps) {
    super();
    this.config = config;
    this.adapter = deps.adapter;
    this.emitter = deps.emitter;
    this.normalizer = deps.normalizer;
    this.clock = deps.clock ?? (() => performance.now());
    this.log = deps.logger ?? getLogger('Session');
  }

  get state(): ConnectionState {
    return this._state;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  /**
   * Run the session to a terminal state. Resolves, never rejects, for BLE
   * and OSC failures; the GATT link is released before it resolves.
   */
  async run(signal?: AbortSignal): Promise<SessionOutcome> {
    if (this._state.kind !== 'idle') {
      throw new Error(`ConnectionSession already ran (state: ${describeState(this._state)})`);
    }
    this.setState({ kind: 'scanning' });

    const { device: deviceConfig, connection } = this.config;
    let device: DeviceHandle | null;
    try {
      device = await this.adapter.scan({
        namePattern: deviceConfig.namePattern,
        serviceUuid: deviceConfig.serviceUuid,
        timeoutMs: connection.scanTimeoutMs,
        signal,
      });
    } catch (err) {
      return this.finish(signal?.aborted
        ? { kind: 'failed', reason: { cause: 'cancelled' } }
        : { kind: 'failed', reason: { cause: 'adapter-error', message: errorMessage(err) } });
    }

    if (signal?.aborted) {
      return this.finish({ kind: 'failed', reason: { cause: 'cancelled' } });
    }
    if (!device) {
      return this.finish({ kind: 'failed', reason: { cause: 'scan-timeout', timeoutMs: connection.scanTimeoutMs } });
    }

    this.stats.deviceName = device.name;
    this.stats.deviceId = device.id;
    this.setState({ kind: 'connecting', device });

    let link: GattLink | null = null;
    try {
      let stream: NotificationStream;
      try {
        const options = { timeoutMs: connection.connectTimeoutMs, signal };
        link = await this.adapter.connect(device, options);
        stream = await untilAborted(
          this.adapter.subscribe(link, deviceConfig.serviceUuid, deviceConfig.characteristicUuid, options),
          signal,
        );
      } catch (err) {
        return this.finish(signal?.aborted
          ? { kind: 'failed', reason: { cause: 'cancelled' } }
          : { kind: 'failed', reason: { cause: 'connect-error', message: errorMessage(err) } });
      }
      if (signal?.aborted) {
        return this.finish({ kind: 'failed', reason: { cause: 'cancelled' } });
      }

      this.setState({ kind: 'subscribed', device });
      this.reachedSubscribed = true;
      this.stats.subscribedAt = Date.now();

      const reason = await this.consume(stream, signal);
      return this.finish({ kind: 'disconnected', reason });
    } finally {
      if (link) await this.release(link);
    }
  }

  // --- Notification handling ---

  private async consume(stream: NotificationStream, signal?: AbortSignal): Promise<DisconnectReason> {
    const onAbort = () => stream.end({ cause: 'cancelled' });
    if (signal?.aborted) onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const maxMalformed = this.config.connection.maxConsecutiveMalformed;
    let consecutiveMalformed = 0;

    try {
      for (let frame = await stream.next(); frame !== null; frame = await stream.next()) {
        if (signal?.aborted) break;

        const reading = this.decode(frame);
        if (!reading) {
          consecutiveMalformed++;
          if (consecutiveMalformed >= maxMalformed) {
            this.log.warn({ consecutive: consecutiveMalformed }, 'Too many malformed payloads, dropping device');
            return { cause: 'malformed-burst', consecutive: consecutiveMalformed };
          }
          continue;
        }

        consecutiveMalformed = 0;
        this.noteDropped(stream);
        await this.handleReading(reading, signal);
      }
      if (signal?.aborted) return { cause: 'cancelled' };
      return stream.endReason ?? { cause: 'stream-ended' };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.stats.droppedFrames = stream.dropped;
    }
  }

  /** Frames replaced while the previous reading was being published */
  private noteDropped(stream: NotificationStream): void {
    if (stream.dropped <= this.stats.droppedFrames) return;
    const replaced = stream.dropped - this.stats.droppedFrames;
    this.stats.droppedFrames = stream.dropped;
    this.log.warn({ replaced, dropped: stream.dropped }, 'Notifications arrived faster than they were published');
  }

  private decode(frame: Uint8Array): SensorReading | null {
    try {
      return decodeSensorReading(frame, this.clock());
    } catch (err) {
      this.stats.malformedPayloads++;
      this.stats.lastError = errorMessage(err);
      this.log.warn({ error: errorMessage(err), length: frame.length }, 'Skipping malformed payload');
      return null;
    }
  }

  private async handleReading(reading: SensorReading, signal?: AbortSignal): Promise<void> {
    const normalized = this.normalizer(reading.heartRateBpm);
    this.stats.readings++;
    if (normalized.clampedLow) this.stats.clampedLow++;
    if (normalized.clampedHigh) this.stats.clampedHigh++;

    this.log.debug({
      bpm: reading.heartRateBpm,
      contact: reading.sensorContactFlag,
      value: normalized.value,
      clampedLow: normalized.clampedLow,
      clampedHigh: normalized.clampedHigh,
    }, 'Heart rate');

    await this.publish('heartRate', reading.heartRateBpm);
    if (signal?.aborted) return;
    await this.publish('normalized', normalized.value);
    this.emit('reading', reading, normalized);
  }

  /** Best-effort send; a failure is counted and the reading still counts as handled */
  private async publish(parameter: ParameterKind, value: number): Promise<void> {
    try {
      await this.emitter.publish(parameter, value);
    } catch (err) {
      this.stats.publishFailures++;
      this.stats.lastError = errorMessage(err);
      if (err instanceof TransportUnavailableError) {
        this.log.warn({ parameter, error: err.message }, 'OSC transport unavailable');
      } else {
        this.log.error({ parameter, error: errorMessage(err) }, 'OSC publish failed');
      }
    }
  }

  // --- State transitions ---

  private setState(next: ConnectionState): void {
    const prev = this._state;
    this._state = transition(prev, next);
    this.log.debug(`${describeState(prev)} -> ${describeState(next)}`);
    this.emit('stateChange', next, prev);
  }

  private finish(state: TerminalState): SessionOutcome {
    this.setState(state);
    this.stats.endedAt = Date.now();
    if (state.kind === 'failed') {
      const { reason } = state;
      if (reason.cause === 'scan-timeout') {
        this.stats.lastError = new ScanTimeoutError(reason.timeoutMs).message;
      } else if (reason.cause !== 'cancelled') {
        this.stats.lastError = reason.message;
      }
    }
    return {
      state,
      reachedSubscribed: this.reachedSubscribed,
      stats: this.getStats(),
    };
  }

  private async release(link: GattLink): Promise<void> {
    try {
      await this.adapter.disconnect(link);
    } catch (err) {
      this.log.warn({ device: link.device.id, error: errorMessage(err) }, 'Failed to release GATT link');
    }
  }
}
