/**
 * OSC Emitter
 *
 * Publishes heart-rate values to the avatar application's OSC parameters:
 *
 *   /avatar/parameters/heartbeat_value     int    raw bpm
 *   /avatar/parameters/heartbeat_waittime  float  0.0-1.0 normalized
 *
 * Addresses come from a template ("{name}" is replaced by the parameter name)
 * or a per-parameter override. Each publish is one best-effort UDP packet.
 */

import { OSCArgument } from 'osc';
import { TransportUnavailableError, errorMessage } from '../errors';

/** OSC transport capability: fire-and-forget, no acknowledgement */
export interface OscTransport {
  send(host: string, port: number, address: string, args: OSCArgument[]): Promise<void>;
}

export type ParameterKind = 'heartRate' | 'normalized';

export interface ParameterConfig {
  name: string;
  /** Full OSC address, overrides the template */
  address?: string;
}

export interface OscOutputConfig {
  host: string;
  port: number;
  addressTemplate: string;
  parameters: Record<ParameterKind, ParameterConfig>;
}

export const DEFAULT_ADDRESS_TEMPLATE = '/avatar/parameters/{name}';

/** OSC type tag per parameter */
const PARAMETER_TYPES: Record<ParameterKind, 'i' | 'f'> = {
  heartRate: 'i',
  normalized: 'f',
};

export function resolveAddress(template: string, parameter: ParameterConfig): string {
  return parameter.address ?? template.split('{name}').join(parameter.name);
}

export class OscEmitter {
  private readonly host: string;
  private readonly port: number;
  private readonly addresses: Record<ParameterKind, string>;

  constructor(config: OscOutputConfig, private readonly transport: OscTransport) {
    this.host = config.host;
    this.port = config.port;
    this.addresses = {
      heartRate: resolveAddress(config.addressTemplate, config.parameters.heartRate),
      normalized: resolveAddress(config.addressTemplate, config.parameters.normalized),
    };
  }

  addressOf(parameter: ParameterKind): string {
    return this.addresses[parameter];
  }

  /**
   * Send one value. Rejects with TransportUnavailableError when the
   * transport fails; nothing is queued for later.
   */
  async publish(parameter: ParameterKind, value: number): Promise<void> {
    const type = PARAMETER_TYPES[parameter];
    const arg: OSCArgument = { type, value: type === 'i' ? Math.round(value) : value };
    const address = this.addresses[parameter];

    try {
      await this.transport.send(this.host, this.port, address, [arg]);
    } catch (err) {
      if (err instanceof TransportUnavailableError) throw err;
      throw new TransportUnavailableError(
        `OSC send to ${this.host}:${this.port}${address} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
