/**
 * NotificationStream
 *
 * Turns characteristic notifications (pushed by the adapter) into frames the
 * session pulls one at a time. A stream belongs to one subscription: once it
 * ends it stays ended, and a new subscription gets a new stream.
 *
 * At most one frame waits while the consumer is busy. If another arrives, the
 * newer frame replaces it, so memory stays constant and order is preserved.
 */

export type StreamEndReason =
  | { cause: 'stream-ended' }
  | { cause: 'adapter-disconnect'; detail?: string }
  | { cause: 'cancelled' };

export class NotificationStream {
  private pending: Uint8Array | null = null;
  private waiter: ((frame: Uint8Array | null) => void) | null = null;
  private _endReason: StreamEndReason | null = null;
  private _dropped = 0;

  /** Why the stream ended, or null while it is still open */
  get endReason(): StreamEndReason | null {
    return this._endReason;
  }

  get ended(): boolean {
    return this._endReason !== null;
  }

  /** Frames replaced before the consumer got to them */
  get dropped(): number {
    return this._dropped;
  }

  /** Deliver a frame from the adapter. Ignored after the stream ended. */
  push(frame: Uint8Array): void {
    if (this._endReason) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(frame);
      return;
    }

    if (this.pending) this._dropped++;
    this.pending = frame;
  }

  /** End the stream. The first reason wins. */
  end(reason: StreamEndReason): void {
    if (this._endReason) return;
    this._endReason = reason;

    if (reason.cause === 'cancelled') {
      this.pending = null;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }

  /**
   * Wait for the next frame. Resolves null once the stream has ended
   * and nothing is left to deliver.
   */
  next(): Promise<Uint8Array | null> {
    if (this.pending) {
      const frame = this.pending;
      this.pending = null;
      return Promise.resolve(frame);
    }
    if (this._endReason) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('NotificationStream supports a single consumer'));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}
