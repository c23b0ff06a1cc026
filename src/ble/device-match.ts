/**
 * Device matching for scans.
 *
 * A pattern matches a device when it equals the device id or address
 * (case-insensitive), or when it matches the advertised name as a
 * case-insensitive regular expression. No pattern matches every device.
 */

import { DeviceHandle } from './types';

/** Bluetooth UUIDs arrive as "180d" or full 128-bit strings, with or without dashes */
export function normalizeUuid(uuid: string): string {
  const compact = uuid.toLowerCase().replace(/-/g, '');
  const base = /^0000([0-9a-f]{4})00001000800000805f9b34fb$/.exec(compact);
  return base ? base[1] : compact;
}

export function advertisesService(serviceUuids: readonly string[], serviceUuid: string): boolean {
  const wanted = normalizeUuid(serviceUuid);
  return serviceUuids.some((uuid) => normalizeUuid(uuid) === wanted);
}

export function compilePattern(pattern: string): RegExp {
  return new RegExp(pattern, 'i');
}

export function matchesDevice(pattern: string | undefined, device: Pick<DeviceHandle, 'id' | 'address' | 'name'>): boolean {
  if (pattern === undefined || pattern === '') return true;

  const lower = pattern.toLowerCase();
  if (device.id.toLowerCase() === lower || device.address.toLowerCase() === lower) {
    return true;
  }
  return compilePattern(pattern).test(device.name);
}
