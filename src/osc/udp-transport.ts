/**
 * UDP OSC transport
 *
 * Binds an ephemeral UDP socket and writes each message as a single OSC
 * packet. There is no acknowledgement; errors only surface when the local
 * socket cannot send (closed socket, unresolvable host, and so on).
 */

import * as dgram from 'dgram';
import * as osc from 'osc';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { TransportUnavailableError } from '../errors';
import { OscTransport } from './emitter';

export class UdpOscTransport implements OscTransport {
  private socket: dgram.Socket | null = null;
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? getLogger('OscTransport');
  }

  isOpen(): boolean {
    return this.socket !== null;
  }

  /** Bind to any available local port for sending */
  open(): Promise<void> {
    if (this.socket) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');

      const onBindError = (err: Error) => {
        socket.close();
        reject(new TransportUnavailableError(`UDP bind failed: ${err.message}`, { cause: err }));
      };
      socket.once('error', onBindError);

      socket.bind(0, () => {
        socket.removeListener('error', onBindError);
        socket.on('error', (err: Error) => {
          this.log.error({ error: err.message }, 'UDP socket error');
        });
        this.socket = socket;
        this.log.debug({ port: socket.address().port }, 'UDP socket ready');
        resolve();
      });
    });
  }

  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
  }

  send(host: string, port: number, address: string, args: osc.OSCArgument[]): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new TransportUnavailableError('OSC transport is not open'));
    }

    const packet = osc.writeMessage({ address, args });

    return new Promise((resolve, reject) => {
      socket.send(packet, 0, packet.length, port, host, (err) => {
        if (err) {
          reject(new TransportUnavailableError(`UDP send failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }
}
