/**
 * Value Normalizer
 *
 * Maps a heart rate onto the 0.0-1.0 control range the avatar parameter expects.
 *
 *   linear        (bpm - minBpm) / (maxBpm - minBpm)
 *   beat-period   baseSeconds / (60 / bpm - flexSeconds)
 *
 * The beat-period mapping turns the interval between beats into an animation
 * wait time: base + flex * value seconds equals one beat.
 *
 * Out-of-range results are clamped and flagged, never rejected.
 */

import { ConfigurationError } from '../errors';

export interface LinearMapping {
  kind: 'linear';
  minBpm: number;
  maxBpm: number;
}

export interface BeatPeriodMapping {
  kind: 'beat-period';
  baseSeconds: number;
  flexSeconds: number;
}

export type NormalizationMapping = LinearMapping | BeatPeriodMapping;

export interface NormalizedValue {
  readonly value: number;
  readonly clampedLow: boolean;
  readonly clampedHigh: boolean;
}

export type Normalizer = (bpm: number) => NormalizedValue;

export const DEFAULT_MAPPING: LinearMapping = { kind: 'linear', minBpm: 40, maxBpm: 180 };

function clamp(raw: number): NormalizedValue {
  if (raw < 0) return { value: 0, clampedLow: true, clampedHigh: false };
  if (raw > 1) return { value: 1, clampedLow: false, clampedHigh: true };
  return { value: raw, clampedLow: false, clampedHigh: false };
}

function validate(mapping: NormalizationMapping): void {
  switch (mapping.kind) {
    case 'linear':
      if (!Number.isFinite(mapping.minBpm) || !Number.isFinite(mapping.maxBpm)) {
        throw new ConfigurationError('Normalization range must be finite');
      }
      if (mapping.maxBpm <= mapping.minBpm) {
        throw new ConfigurationError(
          `Normalization range is empty: maxBpm (${mapping.maxBpm}) must be greater than minBpm (${mapping.minBpm})`,
        );
      }
      return;
    case 'beat-period':
      if (!(mapping.baseSeconds > 0) || !(mapping.flexSeconds >= 0)) {
        throw new ConfigurationError('beat-period mapping needs baseSeconds > 0 and flexSeconds >= 0');
      }
      return;
    default: {
      const unknown: never = mapping;
      throw new ConfigurationError(`Unknown normalization mapping: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Validate the mapping once and return the per-reading function.
 * Throws ConfigurationError for a degenerate mapping.
 */
export function createNormalizer(mapping: NormalizationMapping = DEFAULT_MAPPING): Normalizer {
  validate(mapping);

  if (mapping.kind === 'linear') {
    const { minBpm, maxBpm } = mapping;
    return (bpm) => clamp((bpm - minBpm) / (maxBpm - minBpm));
  }

  const { baseSeconds, flexSeconds } = mapping;
  return (bpm) => {
    if (bpm <= 0) return clamp(0);
    const denominator = 60 / bpm - flexSeconds;
    // beat shorter than the fixed part of the animation
    if (denominator <= 0) return clamp(Infinity);
    return clamp(baseSeconds / denominator);
  };
}
