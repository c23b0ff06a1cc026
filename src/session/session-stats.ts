/**
 * SessionStats: per-session counters
 *
 * Counters only. No reading values are kept.
 */

export interface SessionStats {
  deviceName: string | null;
  deviceId: string | null;
  startedAt: number;
  subscribedAt: number | null;
  endedAt: number | null;
  readings: number;
  malformedPayloads: number;
  publishFailures: number;
  clampedLow: number;
  clampedHigh: number;
  droppedFrames: number;
  lastError: string | null;
}

export function createSessionStats(startedAt = Date.now()): SessionStats {
  return {
    deviceName: null,
    deviceId: null,
    startedAt,
    subscribedAt: null,
    endedAt: null,
    readings: 0,
    malformedPayloads: 0,
    publishFailures: 0,
    clampedLow: 0,
    clampedHigh: 0,
    droppedFrames: 0,
    lastError: null,
  };
}
