/**
 * BLE capability
 *
 * The session only talks to the adapter through this interface. The Noble
 * adapter implements it for real hardware, the emulator for simulated runs,
 * and tests supply scripted fakes.
 */

import { NotificationStream } from './notification-stream';

/** A discovered peripheral */
export interface DeviceHandle {
  readonly id: string;
  readonly address: string;
  readonly name: string;
  readonly rssi?: number;
}

/** An open GATT connection to a device */
export interface GattLink {
  readonly device: DeviceHandle;
}

export interface ScanOptions {
  /** Device id, address, or name pattern; undefined matches any heart-rate sensor */
  namePattern?: string;
  serviceUuid: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ConnectOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface BleAdapter {
  /** Resolve the first matching device, or null when the scan times out */
  scan(options: ScanOptions): Promise<DeviceHandle | null>;

  /** Open a GATT connection. Rejects with ConnectError. */
  connect(device: DeviceHandle, options: ConnectOptions): Promise<GattLink>;

  /**
   * Discover the characteristic and start notifications on it. Rejects with
   * ConnectError when discovery or the subscription fails or outlasts
   * `options.timeoutMs`, and with AbortError when the signal fires.
   */
  subscribe(
    link: GattLink,
    serviceUuid: string,
    characteristicUuid: string,
    options: ConnectOptions,
  ): Promise<NotificationStream>;

  /** Release the link. Safe to call on a link that already dropped. */
  disconnect(link: GattLink): Promise<void>;
}
