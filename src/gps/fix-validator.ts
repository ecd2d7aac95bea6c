import type { FixValidation, LocationFix } from '@/types';
import { normalizeDegrees } from './geo-math';

/**
 * Sanitize a raw fix.
 *
 * Rejects coordinates out of range, negative accuracy, and timestamps that are
 * not strictly after the previously accepted fix (late fixes are dropped, not
 * reordered). Optional speed/bearing fields are cleaned rather than rejected:
 * a negative or non-finite speed becomes null, a bearing is wrapped into [0, 360).
 */
export function validateFix(
  fix: LocationFix,
  previousAcceptedTimestampMs: number | null
): FixValidation {
  if (!Number.isFinite(fix.latitude) || fix.latitude < -90 || fix.latitude > 90) {
    return { ok: false, reason: 'latitude-out-of-range' };
  }
  if (!Number.isFinite(fix.longitude) || fix.longitude < -180 || fix.longitude > 180) {
    return { ok: false, reason: 'longitude-out-of-range' };
  }
  if (!Number.isFinite(fix.accuracyMeters) || fix.accuracyMeters < 0) {
    return { ok: false, reason: 'invalid-accuracy' };
  }
  if (!Number.isFinite(fix.timestampMs) || fix.timestampMs <= 0) {
    return { ok: false, reason: 'invalid-timestamp' };
  }
  if (previousAcceptedTimestampMs !== null && fix.timestampMs <= previousAcceptedTimestampMs) {
    return { ok: false, reason: 'out-of-order' };
  }

  return {
    ok: true,
    fix: {
      latitude: fix.latitude,
      longitude: fix.longitude,
      accuracyMeters: fix.accuracyMeters,
      timestampMs: fix.timestampMs,
      reportedSpeedMps: sanitizeSpeed(fix.reportedSpeedMps),
      reportedBearingDeg: sanitizeBearing(fix.reportedBearingDeg),
    },
  };
}

function sanitizeSpeed(speed: number | null): number | null {
  if (speed === null || !Number.isFinite(speed) || speed < 0) return null;
  return speed;
}

function sanitizeBearing(bearing: number | null): number | null {
  if (bearing === null || !Number.isFinite(bearing)) return null;
  return normalizeDegrees(bearing);
}
