/**
 * Heart Rate Measurement codec
 *
 * Decodes the GATT Heart Rate Measurement characteristic (0x2A37):
 *
 *   Byte 0        Flags
 *                   bit 0  heart-rate value format (0 = uint8, 1 = uint16 LE)
 *                   bit 1  sensor contact detected
 *                   bit 2  sensor contact status supported
 *                   bit 3  energy expended present (uint16 LE, kJ)
 *                   bit 4  RR intervals present (uint16 LE each, 1/1024 s)
 *   Byte 1..2     Heart-rate value (1 or 2 bytes)
 *   next 2        Energy expended (if bit 3)
 *   rest          RR intervals, in pairs (if bit 4)
 *
 * Only the heart-rate value and the contact flag travel further downstream.
 */

import { MalformedPayloadError } from '../errors';

export const HEART_RATE_SERVICE_UUID = '180d';
export const HEART_RATE_MEASUREMENT_UUID = '2a37';

const FLAG_UINT16 = 0x01;
const FLAG_CONTACT_DETECTED = 0x02;
const FLAG_CONTACT_SUPPORTED = 0x04;
const FLAG_ENERGY_EXPENDED = 0x08;
const FLAG_RR_INTERVALS = 0x10;

/** RR intervals are transmitted in 1/1024 second units */
const RR_UNITS_PER_SECOND = 1024;

export type ValueFormat = 'uint8' | 'uint16';
export type SensorContact = 'unsupported' | 'detected' | 'not-detected';

export interface HeartRateMeasurement {
  readonly heartRateBpm: number;
  readonly valueFormat: ValueFormat;
  readonly sensorContact: SensorContact;
  readonly energyExpendedKj?: number;
  readonly rrIntervalsMs: readonly number[];
}

/** One decoded notification, handed to the publish path and then discarded */
export interface SensorReading {
  readonly heartRateBpm: number;
  readonly sensorContactFlag?: boolean;
  /** Monotonic milliseconds (performance.now()) */
  readonly timestamp: number;
}

/** Minimum length the flags byte implies, not counting RR data */
function impliedLength(flags: number): number {
  let length = 1 + ((flags & FLAG_UINT16) ? 2 : 1);
  if (flags & FLAG_ENERGY_EXPENDED) length += 2;
  if (flags & FLAG_RR_INTERVALS) length += 2;
  return length;
}

function readUint16LE(bytes: Uint8Array, offset: number): number {
  return bytes[offset] | (bytes[offset + 1] << 8);
}

export function parseHeartRateMeasurement(bytes: Uint8Array): HeartRateMeasurement {
  if (bytes.length === 0) {
    throw new MalformedPayloadError('Empty heart rate measurement', 0);
  }

  const flags = bytes[0];
  const required = impliedLength(flags);
  if (bytes.length < required) {
    throw new MalformedPayloadError(
      `Heart rate measurement is ${bytes.length} byte(s), flags 0x${flags.toString(16).padStart(2, '0')} imply at least ${required}`,
      bytes.length,
    );
  }

  let offset = 1;
  const valueFormat: ValueFormat = (flags & FLAG_UINT16) ? 'uint16' : 'uint8';
  let heartRateBpm: number;
  if (valueFormat === 'uint16') {
    heartRateBpm = readUint16LE(bytes, offset);
    offset += 2;
  } else {
    heartRateBpm = bytes[offset];
    offset += 1;
  }

  let sensorContact: SensorContact = 'unsupported';
  if (flags & FLAG_CONTACT_SUPPORTED) {
    sensorContact = (flags & FLAG_CONTACT_DETECTED) ? 'detected' : 'not-detected';
  }

  let energyExpendedKj: number | undefined;
  if (flags & FLAG_ENERGY_EXPENDED) {
    energyExpendedKj = readUint16LE(bytes, offset);
    offset += 2;
  }

  const rrIntervalsMs: number[] = [];
  if (flags & FLAG_RR_INTERVALS) {
    const remaining = bytes.length - offset;
    if (remaining % 2 !== 0) {
      throw new MalformedPayloadError(
        `RR interval data has odd length ${remaining}`,
        bytes.length,
      );
    }
    for (; offset < bytes.length; offset += 2) {
      rrIntervalsMs.push((readUint16LE(bytes, offset) * 1000) / RR_UNITS_PER_SECOND);
    }
  }

  return {
    heartRateBpm,
    valueFormat,
    sensorContact,
    ...(energyExpendedKj !== undefined ? { energyExpendedKj } : {}),
    rrIntervalsMs,
  };
}

/** Decode a notification frame into the reading the session publishes. */
export function decodeSensorReading(bytes: Uint8Array, timestamp: number): SensorReading {
  const measurement = parseHeartRateMeasurement(bytes);
  const reading: SensorReading = measurement.sensorContact === 'unsupported'
    ? { heartRateBpm: measurement.heartRateBpm, timestamp }
    : {
      heartRateBpm: measurement.heartRateBpm,
      sensorContactFlag: measurement.sensorContact === 'detected',
      timestamp,
    };
  return reading;
}

export interface MeasurementInput {
  heartRateBpm: number;
  valueFormat?: ValueFormat;
  sensorContact?: SensorContact;
  energyExpendedKj?: number;
  /** Raw RR values in 1/1024 s units */
  rrIntervals?: number[];
}

/**
 * Encode a measurement the way a sensor would send it.
 * Values above 255 always use the uint16 format.
 */
export function encodeHeartRateMeasurement(input: MeasurementInput): Buffer {
  const wide = input.valueFormat === 'uint16' || input.heartRateBpm > 0xff;
  const contact = input.sensorContact ?? 'unsupported';
  const rr = input.rrIntervals ?? [];

  let flags = 0;
  if (wide) flags |= FLAG_UINT16;
  if (contact !== 'unsupported') flags |= FLAG_CONTACT_SUPPORTED;
  if (contact === 'detected') flags |= FLAG_CONTACT_DETECTED;
  if (input.energyExpendedKj !== undefined) flags |= FLAG_ENERGY_EXPENDED;
  if (rr.length > 0) flags |= FLAG_RR_INTERVALS;

  const bytes: number[] = [flags];
  if (wide) {
    bytes.push(input.heartRateBpm & 0xff, (input.heartRateBpm >> 8) & 0xff);
  } else {
    bytes.push(input.heartRateBpm & 0xff);
  }
  if (input.energyExpendedKj !== undefined) {
    bytes.push(input.energyExpendedKj & 0xff, (input.energyExpendedKj >> 8) & 0xff);
  }
  for (const interval of rr) {
    bytes.push(interval & 0xff, (interval >> 8) & 0xff);
  }
  return Buffer.from(bytes);
}
