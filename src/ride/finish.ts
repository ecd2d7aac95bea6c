import type { FinishRideResult, RideSession, RideSummary } from '@/types';
import { MIN_RIDE_DURATION_MS } from '@/constants/ride';

const RIDE_NAME_FORMAT: Intl.DateTimeFormatOptions = {
  month: 'short',
  day: 'numeric',
  year: 'numeric',
};

/** Default ride name, e.g. "Ride on Jan 15, 2025" */
export function generateRideName(timestampMs: number, timeZone?: string): string {
  const date = new Intl.DateTimeFormat('en-US', { ...RIDE_NAME_FORMAT, timeZone }).format(timestampMs);
  return `Ride on ${date}`;
}

/** Average moving speed in km/h (0 when nothing has been recorded) */
export function averageSpeedKmh(distanceMeters: number, movingDurationMs: number): number {
  if (movingDurationMs <= 0) return 0;
  return (distanceMeters / (movingDurationMs / 1000)) * 3.6;
}

/**
 * Decide what happens to a stopped ride. Rides shorter than the minimum
 * (an accidental start/stop) are reported as too short and not summarized.
 */
export function finishRide(
  session: RideSession,
  endedAtMs: number,
  minDurationMs: number = MIN_RIDE_DURATION_MS
): FinishRideResult {
  const durationMs = endedAtMs - session.startedAtMs;
  if (durationMs < minDurationMs) {
    return { kind: 'tooShort', durationMs };
  }
  return { kind: 'saved', summary: summarizeRide(session, endedAtMs) };
}

export function summarizeRide(session: RideSession, endedAtMs: number): RideSummary {
  return {
    id: session.id,
    name: generateRideName(session.startedAtMs),
    startedAtMs: session.startedAtMs,
    endedAtMs,
    movingDistanceMeters: session.movingDistanceMeters,
    movingDurationMs: session.movingDurationMs,
    pausedDurationMs: session.pausedDurationMs,
    manualPausedDurationMs: session.manualPausedDurationMs,
    autoPausedDurationMs: session.autoPausedDurationMs,
    maxSpeedKmh: session.maxSpeedKmh,
    avgSpeedKmh: averageSpeedKmh(session.movingDistanceMeters, session.movingDurationMs),
    pointCount: session.points.length,
  };
}
