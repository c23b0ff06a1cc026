/**
 * Bridge error taxonomy
 *
 *   MalformedPayloadError      one notification frame, logged and skipped
 *   ScanTimeoutError           session-fatal, supervisor backs off and retries
 *   ConnectError               session-fatal, supervisor backs off and retries
 *   TransportUnavailableError  one OSC publish, logged, never retried
 *   ConfigurationError         process-fatal at startup
 *   BleUnavailableError        no usable Bluetooth stack, process-fatal at startup
 *   IllegalTransitionError     programming error in the session state machine
 */

export class MalformedPayloadError extends Error {
  readonly name = 'MalformedPayloadError';

  constructor(message: string, readonly length: number) {
    super(message);
  }
}

export class ScanTimeoutError extends Error {
  readonly name = 'ScanTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`No matching heart-rate sensor found within ${timeoutMs}ms`);
  }
}

export class ConnectError extends Error {
  readonly name = 'ConnectError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TransportUnavailableError extends Error {
  readonly name = 'TransportUnavailableError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';
}

export class BleUnavailableError extends Error {
  readonly name = 'BleUnavailableError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class IllegalTransitionError extends Error {
  readonly name = 'IllegalTransitionError';

  constructor(readonly from: string, readonly to: string) {
    super(`Illegal connection state transition: ${from} -> ${to}`);
  }
}

/** Rejection of an operation interrupted through its AbortSignal */
export class AbortError extends Error {
  readonly name = 'AbortError';

  constructor(message = 'The operation was aborted') {
    super(message);
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Whether a thrown value is the rejection of an aborted operation */
export function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}
