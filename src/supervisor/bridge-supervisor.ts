/**
 * BridgeSupervisor
 *
 * The process's outermost control loop. Runs one ConnectionSession at a
 * time; whenever a session ends it waits out a delay and starts a fresh one.
 *
 * After a session reaches 'subscribed' the supervisor pins that device: the
 * next sessions scan for its id only. Once `sameDeviceRetries` of them have
 * failed in a row the pin is dropped and any matching sensor is accepted
 * again. A session that made it to 'subscribed' resets the backoff.
 *
 * Delays: a scan that found nothing (while unpinned) waits `scanRetryDelayMs`;
 * every other failure follows the backoff policy.
 *
 * Runs until the AbortSignal fires. Aborting interrupts the active scan,
 * connect, notification wait or backoff delay.
 *
 * Events:
 *   'sessionStarted' (sessionNumber: number, session: ConnectionSession)
 *   'sessionEnded'   (outcome: SessionOutcome)
 *   'retryScheduled' (retry: RetrySchedule)
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { isAbortError } from '../errors';
import { BleAdapter } from '../ble/types';
import { Normalizer } from '../heart-rate/normalizer';
import {
  ConnectionSession,
  Publisher,
  SessionConfig,
  SessionOutcome,
} from '../session/connection-session';
import { describeState } from '../session/connection-state';
import { BackoffPolicy, computeBackoffDelay } from './backoff';

export interface SupervisorConfig extends SessionConfig {
  connection: SessionConfig['connection'] & {
    backoff: BackoffPolicy;
    /** Delay after a scan that found no sensor */
    scanRetryDelayMs: number;
    /** Failed sessions against the last streaming device before rescanning (0 = never pin) */
    sameDeviceRetries: number;
  };
}

/** Abortable delay; rejects with an AbortError when the signal fires */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface SupervisorDeps {
  adapter: BleAdapter;
  emitter: Publisher;
  normalizer: Normalizer;
  sleep?: Sleep;
  logger?: Logger;
}

export interface RetrySchedule {
  attempt: number;
  delayMs: number;
  /** Device the next session is pinned to, null for an open scan */
  deviceId: string | null;
}

interface PinnedDevice {
  id: string;
  name: string;
  failures: number;
}

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

export class BridgeSupervisor extends EventEmitter {
  private readonly config: SupervisorConfig;
  private readonly deps: SupervisorDeps;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private running = false;
  private pinned: PinnedDevice | null = null;

  constructor(config: SupervisorConfig, deps: SupervisorDeps) {
    super();
    this.config = config;
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
    this.log = deps.logger ?? getLogger('Supervisor');
  }

  isRunning(): boolean {
    return this.running;
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('BridgeSupervisor is already running');
    }
    this.running = true;

    let attempt = 0;
    let sessionNumber = 0;
    this.pinned = null;

    try {
      while (!signal.aborted) {
        sessionNumber++;
        const pinnedForSession = this.pinned;
        const session = new ConnectionSession(this.sessionConfig(), {
          adapter: this.deps.adapter,
          emitter: this.deps.emitter,
          normalizer: this.deps.normalizer,
          logger: (this.deps.logger ?? getLogger('Session')).child({ session: sessionNumber }),
        });
        this.emit('sessionStarted', sessionNumber, session);

        const outcome = await session.run(signal);
        this.emit('sessionEnded', outcome);
        if (signal.aborted) break;
        this.logOutcome(outcome);

        attempt = outcome.reachedSubscribed ? 1 : attempt + 1;
        this.updatePin(outcome);

        const nothingFound = pinnedForSession === null
          && outcome.state.kind === 'failed'
          && outcome.state.reason.cause === 'scan-timeout';
        const retry: RetrySchedule = {
          attempt,
          delayMs: nothingFound
            ? this.config.connection.scanRetryDelayMs
            : computeBackoffDelay(this.config.connection.backoff, attempt),
          deviceId: this.pinnedDeviceId(),
        };
        this.log.info(retry, nothingFound ? `Rescanning in ${retry.delayMs}ms` : `Reconnecting in ${retry.delayMs}ms`);
        this.emit('retryScheduled', retry);

        try {
          await this.sleep(retry.delayMs, signal);
        } catch (err) {
          if (signal.aborted || isAbortError(err)) break;
          throw err;
        }
      }
    } finally {
      this.running = false;
      this.log.info({ sessions: sessionNumber }, 'Supervisor stopped');
    }
  }

  /** Device the next session is pinned to, or null */
  pinnedDeviceId(): string | null {
    return this.pinned?.id ?? null;
  }

  private sessionConfig(): SessionConfig {
    if (!this.pinned) return this.config;
    return {
      ...this.config,
      device: { ...this.config.device, namePattern: this.pinned.id },
    };
  }

  private updatePin(outcome: SessionOutcome): void {
    const { sameDeviceRetries } = this.config.connection;
    const { deviceId, deviceName } = outcome.stats;

    if (outcome.reachedSubscribed && deviceId !== null && sameDeviceRetries > 0) {
      this.pinned = { id: deviceId, name: deviceName ?? deviceId, failures: 0 };
      return;
    }
    if (!this.pinned || outcome.reachedSubscribed) return;

    this.pinned.failures++;
    if (this.pinned.failures >= sameDeviceRetries) {
      this.log.warn({ device: this.pinned.name, failures: this.pinned.failures }, 'Giving up on device, rescanning');
      this.pinned = null;
    }
  }

  private logOutcome(outcome: SessionOutcome): void {
    const { state, stats } = outcome;
    const summary = {
      state: describeState(state),
      device: stats.deviceName,
      readings: stats.readings,
      malformed: stats.malformedPayloads,
      publishFailures: stats.publishFailures,
    };

    if (state.kind === 'failed' && state.reason.cause === 'scan-timeout') {
      this.log.info(summary, 'No heart-rate sensor found');
    } else {
      this.log.warn(summary, 'Session ended');
    }
  }
}
