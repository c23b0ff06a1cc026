import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigurationError } from '../errors';
import { createNormalizer } from '../heart-rate/normalizer';

describe('Normalizer', () => {

  describe('linear mapping', () => {
    const normalize = createNormalizer({ kind: 'linear', minBpm: 40, maxBpm: 180 });

    it('should map 75 bpm in [40, 180] to 0.25', () => {
      assert.deepEqual(normalize(75), { value: 0.25, clampedLow: false, clampedHigh: false });
    });

    it('should map the range ends to 0 and 1 without clamping', () => {
      assert.deepEqual(normalize(40), { value: 0, clampedLow: false, clampedHigh: false });
      assert.deepEqual(normalize(180), { value: 1, clampedLow: false, clampedHigh: false });
    });

    it('should clamp below the range and flag it', () => {
      assert.deepEqual(normalize(30), { value: 0, clampedLow: true, clampedHigh: false });
    });

    it('should clamp above the range and flag it', () => {
      assert.deepEqual(normalize(200), { value: 1, clampedLow: false, clampedHigh: true });
    });

    it('should stay within [0, 1] and never decrease as bpm rises', () => {
      let previous = -1;
      for (let bpm = 0; bpm <= 260; bpm++) {
        const { value } = normalize(bpm);
        assert.ok(value >= 0 && value <= 1, `value ${value} for ${bpm} bpm`);
        assert.ok(value >= previous, `not monotonic at ${bpm} bpm`);
        previous = value;
      }
    });

    it('should use 40-180 bpm by default', () => {
      assert.equal(createNormalizer()(75).value, 0.25);
    });
  });

  describe('degenerate ranges', () => {
    it('should reject maxBpm equal to minBpm', () => {
      assert.throws(() => createNormalizer({ kind: 'linear', minBpm: 100, maxBpm: 100 }), ConfigurationError);
    });

    it('should reject maxBpm below minBpm', () => {
      assert.throws(() => createNormalizer({ kind: 'linear', minBpm: 120, maxBpm: 60 }), ConfigurationError);
    });

    it('should reject a non-finite bound', () => {
      assert.throws(() => createNormalizer({ kind: 'linear', minBpm: 40, maxBpm: Infinity }), ConfigurationError);
    });

    it('should reject a beat-period mapping without a base time', () => {
      assert.throws(() => createNormalizer({ kind: 'beat-period', baseSeconds: 0, flexSeconds: 0.2 }), ConfigurationError);
    });
  });

  describe('beat-period mapping', () => {
    const normalize = createNormalizer({ kind: 'beat-period', baseSeconds: 0.2, flexSeconds: 0.2 });

    it('should turn 75 bpm into a wait time of one third', () => {
      const result = normalize(75);
      assert.ok(Math.abs(result.value - 1 / 3) < 1e-9);
      assert.equal(result.clampedHigh, false);
    });

    it('should clamp when the beat is shorter than the fixed animation time', () => {
      assert.deepEqual(normalize(300), { value: 1, clampedLow: false, clampedHigh: true });
      assert.deepEqual(normalize(240), { value: 1, clampedLow: false, clampedHigh: true });
    });

    it('should map zero bpm to 0', () => {
      assert.deepEqual(normalize(0), { value: 0, clampedLow: false, clampedHigh: false });
    });

    it('should never decrease as bpm rises', () => {
      let previous = -1;
      for (let bpm = 0; bpm <= 320; bpm++) {
        const { value } = normalize(bpm);
        assert.ok(value >= previous, `not monotonic at ${bpm} bpm`);
        previous = value;
      }
    });
  });
});
