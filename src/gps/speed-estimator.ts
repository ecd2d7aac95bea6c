import type { LocationFix, SpeedSample, SpeedSource } from '@/types';
import { MAX_SPEED_MPS, STATIONARY_SPEED_MPS } from '@/constants/ride';
import { fixDistance } from './geo-math';

/**
 * Derive a speed sample from a fix and the fix before it.
 *
 * Priority:
 * 1. Device-reported speed, when present and > 0
 * 2. Haversine distance / elapsed time since the previous fix
 * 3. Zero (first fix, or no time elapsed)
 *
 * The result is clamped to 0–100 km/h, and anything under 1 km/h is
 * reported as stationary with a speed of 0.
 */
export function estimateSpeed(current: LocationFix, previous: LocationFix | null): SpeedSample {
  let speedMps = 0;
  let source: SpeedSource = 'unknown';

  if (current.reportedSpeedMps !== null && current.reportedSpeedMps > 0) {
    speedMps = current.reportedSpeedMps;
    source = 'gps';
  } else if (previous) {
    const elapsedSec = (current.timestampMs - previous.timestampMs) / 1000;
    if (elapsedSec > 0) {
      speedMps = fixDistance(previous, current) / elapsedSec;
      source = 'derived';
    }
  }

  const clamped = Math.min(Math.max(speedMps, 0), MAX_SPEED_MPS);
  const isStationary = clamped < STATIONARY_SPEED_MPS;

  return {
    speedKmh: isStationary ? 0 : clamped * 3.6,
    timestampMs: current.timestampMs,
    source,
    isStationary,
  };
}
