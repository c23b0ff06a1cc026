/**
 * Connection state machine
 *
 *   idle ──> scanning ──> connecting ──> subscribed ──> disconnected(reason)
 *               │              │
 *               └──────────────┴──> failed(reason)
 *
 * failed and disconnected are terminal for a session instance. Only the
 * ConnectionSession that owns a state value moves it forward.
 */

import { IllegalTransitionError } from '../errors';
import { DeviceHandle } from '../ble/types';

export type FailureReason =
  | { cause: 'scan-timeout'; timeoutMs: number }
  | { cause: 'connect-error'; message: string }
  | { cause: 'adapter-error'; message: string }
  | { cause: 'cancelled' };

export type DisconnectReason =
  | { cause: 'stream-ended' }
  | { cause: 'adapter-disconnect'; detail?: string }
  | { cause: 'malformed-burst'; consecutive: number }
  | { cause: 'cancelled' };

export type ConnectionState =
  | { kind: 'idle' }
  | { kind: 'scanning' }
  | { kind: 'connecting'; device: DeviceHandle }
  | { kind: 'subscribed'; device: DeviceHandle }
  | { kind: 'disconnected'; reason: DisconnectReason }
  | { kind: 'failed'; reason: FailureReason };

export type StateKind = ConnectionState['kind'];

export type TerminalState = Extract<ConnectionState, { kind: 'disconnected' | 'failed' }>;

export function isTerminal(state: ConnectionState): state is TerminalState {
  return state.kind === 'disconnected' || state.kind === 'failed';
}

/** States reachable from each state */
export function allowedNext(kind: StateKind): readonly StateKind[] {
  switch (kind) {
    case 'idle': return ['scanning'];
    case 'scanning': return ['connecting', 'failed'];
    case 'connecting': return ['subscribed', 'failed'];
    case 'subscribed': return ['disconnected'];
    case 'disconnected': return [];
    case 'failed': return [];
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

/** Validate a transition; throws IllegalTransitionError */
export function transition(from: ConnectionState, to: ConnectionState): ConnectionState {
  if (!allowedNext(from.kind).includes(to.kind)) {
    throw new IllegalTransitionError(from.kind, to.kind);
  }
  return to;
}

/** One-line description for logs */
export function describeState(state: ConnectionState): string {
  switch (state.kind) {
    case 'idle':
    case 'scanning':
      return state.kind;
    case 'connecting':
    case 'subscribed':
      return `${state.kind}(${state.device.name || state.device.id})`;
    case 'disconnected':
    case 'failed':
      return `${state.kind}(${state.reason.cause})`;
    default: {
      const unreachable: never = state;
      return unreachable;
    }
  }
}
