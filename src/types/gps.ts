/** A single location fix from the device. Never mutated once created. */
export interface LocationFix {
  readonly latitude: number;               // degrees, [-90, 90]
  readonly longitude: number;              // degrees, [-180, 180]
  readonly accuracyMeters: number;         // horizontal accuracy
  readonly timestampMs: number;            // epoch ms
  readonly reportedSpeedMps: number | null;   // device speed, m/s
  readonly reportedBearingDeg: number | null; // device heading, [0, 360)
}

/** How a speed sample was obtained */
export type SpeedSource = 'gps' | 'derived' | 'unknown';

/** Speed derived from one fix and the fix before it */
export interface SpeedSample {
  speedKmh: number;        // clamped to [0, 100], 0 when stationary
  timestampMs: number;
  source: SpeedSource;
  isStationary: boolean;
}

/** Smoothed heading. `degrees` is null once the heading has gone stale. */
export interface BearingEstimate {
  degrees: number | null;
  lastUpdatedMs: number;
}

/** Why the validator dropped a fix */
export type RejectReason =
  | 'latitude-out-of-range'
  | 'longitude-out-of-range'
  | 'invalid-accuracy'
  | 'invalid-timestamp'
  | 'out-of-order';

export type FixValidation =
  | { ok: true; fix: LocationFix }
  | { ok: false; reason: RejectReason };

/** GPS signal quality, as shown by the status indicator */
export type GpsStatus =
  | { kind: 'unavailable' }
  | { kind: 'acquiring' }
  | { kind: 'active'; accuracyMeters: number };

/** [latitude, longitude] */
export type LatLng = [number, number];
