import type { GpsStatus, LocationFix } from '@/types';
import {
  ACTIVE_ACCURACY_METERS,
  FIX_SILENCE_MS,
  UNAVAILABLE_ACCURACY_METERS
} from '@/constants/ride';

/**
 * Classify signal quality for the status indicator.
 * - unavailable: no permission / location off, silent for >10 s, or accuracy >50 m
 * - acquiring: no fix yet, or accuracy between 10 and 50 m
 * - active: accuracy ≤10 m
 */
export function gpsStatus(
  lastFix: LocationFix | null,
  nowMs: number,
  locationAvailable: boolean
): GpsStatus {
  if (!locationAvailable) return { kind: 'unavailable' };
  if (!lastFix) return { kind: 'acquiring' };
  if (isSilent(lastFix, nowMs)) return { kind: 'unavailable' };
  if (lastFix.accuracyMeters > UNAVAILABLE_ACCURACY_METERS) return { kind: 'unavailable' };
  if (lastFix.accuracyMeters > ACTIVE_ACCURACY_METERS) return { kind: 'acquiring' };
  return { kind: 'active', accuracyMeters: lastFix.accuracyMeters };
}

/** True when no fix has arrived for longer than the silence window */
export function isSilent(lastFix: LocationFix, nowMs: number): boolean {
  return nowMs - lastFix.timestampMs > FIX_SILENCE_MS;
}
