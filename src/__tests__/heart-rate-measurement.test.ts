import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MalformedPayloadError } from '../errors';
import {
  decodeSensorReading,
  encodeHeartRateMeasurement,
  parseHeartRateMeasurement,
} from '../heart-rate/measurement';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('Heart Rate Measurement codec', () => {

  // --- Heart-rate value ---

  describe('heart-rate value', () => {
    it('should decode an 8-bit value', () => {
      const reading = decodeSensorReading(bytes(0x00, 0x4b), 12.5);
      assert.deepEqual(reading, { heartRateBpm: 75, timestamp: 12.5 });
    });

    it('should decode a 16-bit little-endian value', () => {
      const m = parseHeartRateMeasurement(bytes(0x01, 0x2c, 0x01));
      assert.equal(m.heartRateBpm, 300);
      assert.equal(m.valueFormat, 'uint16');
    });

    it('should recover the same bpm from either width', () => {
      const narrow = parseHeartRateMeasurement(bytes(0x00, 0x4b));
      const wide = parseHeartRateMeasurement(bytes(0x01, 0x4b, 0x00));
      assert.equal(narrow.heartRateBpm, 75);
      assert.equal(wide.heartRateBpm, 75);
    });

    it('should accept a zero reading', () => {
      assert.equal(parseHeartRateMeasurement(bytes(0x00, 0x00)).heartRateBpm, 0);
    });
  });

  // --- Optional fields ---

  describe('optional fields', () => {
    it('should leave the contact flag out when contact status is unsupported', () => {
      const reading = decodeSensorReading(bytes(0x02, 0x50), 0);
      assert.equal(reading.sensorContactFlag, undefined);
      assert.equal('sensorContactFlag' in reading, false);
    });

    it('should report contact detected', () => {
      const reading = decodeSensorReading(bytes(0x06, 0x50), 0);
      assert.equal(reading.sensorContactFlag, true);
    });

    it('should report contact not detected', () => {
      const reading = decodeSensorReading(bytes(0x04, 0x50), 0);
      assert.equal(reading.sensorContactFlag, false);
    });

    it('should parse energy expended', () => {
      const m = parseHeartRateMeasurement(bytes(0x08, 0x50, 0x10, 0x01));
      assert.equal(m.heartRateBpm, 80);
      assert.equal(m.energyExpendedKj, 272);
    });

    it('should parse RR intervals in milliseconds', () => {
      const m = parseHeartRateMeasurement(bytes(0x10, 0x50, 0x00, 0x04, 0x00, 0x02));
      assert.deepEqual(m.rrIntervalsMs, [1000, 500]);
    });

    it('should parse every field together', () => {
      const m = parseHeartRateMeasurement(bytes(0x1f, 0x48, 0x00, 0x05, 0x00, 0x00, 0x04));
      assert.deepEqual(m, {
        heartRateBpm: 72,
        valueFormat: 'uint16',
        sensorContact: 'detected',
        energyExpendedKj: 5,
        rrIntervalsMs: [1000],
      });
    });
  });

  // --- Malformed payloads ---

  describe('malformed payloads', () => {
    const cases: Array<[string, Uint8Array]> = [
      ['empty', bytes()],
      ['flags only', bytes(0x00)],
      ['16-bit value missing its high byte', bytes(0x01, 0x4b)],
      ['energy expended truncated', bytes(0x08, 0x50, 0x10)],
      ['RR flag without intervals', bytes(0x10, 0x50)],
      ['RR interval truncated', bytes(0x10, 0x50, 0x00, 0x04, 0x01)],
    ];

    for (const [label, payload] of cases) {
      it(`should reject ${label}`, () => {
        assert.throws(() => decodeSensorReading(payload, 0), MalformedPayloadError);
      });
    }

    it('should report the payload length', () => {
      assert.throws(
        () => parseHeartRateMeasurement(bytes(0x01, 0x4b)),
        (err: unknown) => err instanceof MalformedPayloadError && err.length === 2,
      );
    });
  });

  // --- Determinism ---

  it('should decode the same bytes to the same reading every time', () => {
    const payload = bytes(0x16, 0x5a, 0x00, 0x03);
    const first = decodeSensorReading(payload, 1);
    const second = decodeSensorReading(payload, 1);
    assert.deepEqual(first, second);
    assert.deepEqual(Array.from(payload), [0x16, 0x5a, 0x00, 0x03]);
  });

  // --- Encoder ---

  describe('encodeHeartRateMeasurement', () => {
    it('should encode a small value as uint8', () => {
      assert.deepEqual(Array.from(encodeHeartRateMeasurement({ heartRateBpm: 75 })), [0x00, 0x4b]);
    });

    it('should switch to uint16 above 255', () => {
      assert.deepEqual(Array.from(encodeHeartRateMeasurement({ heartRateBpm: 300 })), [0x01, 0x2c, 0x01]);
    });

    it('should set the contact bits', () => {
      const encoded = encodeHeartRateMeasurement({ heartRateBpm: 60, sensorContact: 'detected' });
      assert.deepEqual(Array.from(encoded), [0x06, 0x3c]);
    });

    it('should produce bytes the decoder reads back', () => {
      const encoded = encodeHeartRateMeasurement({
        heartRateBpm: 140,
        valueFormat: 'uint16',
        sensorContact: 'not-detected',
        energyExpendedKj: 12,
        rrIntervals: [440],
      });
      const m = parseHeartRateMeasurement(encoded);
      assert.equal(m.heartRateBpm, 140);
      assert.equal(m.sensorContact, 'not-detected');
      assert.equal(m.energyExpendedKj, 12);
      assert.equal(m.rrIntervalsMs.length, 1);
    });
  });
});
