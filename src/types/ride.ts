import type { BearingEstimate, GpsStatus, LatLng, LocationFix, SpeedSource } from './gps';

/** Ride recorder states */
export type RideState = 'idle' | 'waitingForFix' | 'recording' | 'manuallyPaused' | 'autoPaused';

/** Events accepted by the ride state machine */
export type RideEvent =
  | 'startRide'
  | 'firstValidFix'
  | 'manualPause'
  | 'autoPause'
  | 'manualResume'
  | 'motionResumes'
  | 'stopRide';

export type PauseKind = 'manual' | 'auto';

/** The active ride. Owned and mutated only by the recorder. */
export interface RideSession {
  id: string;
  state: RideState;
  startedAtMs: number;
  movingDistanceMeters: number;
  movingDurationMs: number;
  pausedDurationMs: number;
  manualPausedDurationMs: number;
  autoPausedDurationMs: number;
  currentPauseStartMs: number | null;
  maxSpeedKmh: number;
  rejectedFixCount: number;
  points: readonly LocationFix[];
}

export interface MapBounds {
  southWest: LatLng;
  northEast: LatLng;
}

export interface RouteSimplificationResult {
  points: LatLng[];
  toleranceMeters: number;
}

/** Read-only view of the ride pushed to listeners on every change */
export interface RideSnapshot {
  state: RideState;
  rideId: string | null;
  movingDistanceMeters: number;
  movingDurationMs: number;
  currentSpeedKmh: number;
  speedSource: SpeedSource;
  pausedDurationMs: number;     // includes the pause in progress
  currentPauseElapsedMs: number | null;
  simplifiedRoute: RouteSimplificationResult;
  bounds: MapBounds | null;
  bearing: BearingEstimate;
  gpsStatus: GpsStatus;
  pointCount: number;
  rejectedFixCount: number;
}

/** A finished ride as it is stored */
export interface RideSummary {
  id: string;
  name: string;
  startedAtMs: number;
  endedAtMs: number;
  movingDistanceMeters: number;
  movingDurationMs: number;
  pausedDurationMs: number;
  manualPausedDurationMs: number;
  autoPausedDurationMs: number;
  maxSpeedKmh: number;
  avgSpeedKmh: number;
  pointCount: number;
}

/** Outcome of stopping a ride */
export type FinishRideResult =
  | { kind: 'saved'; summary: RideSummary }
  | { kind: 'tooShort'; durationMs: number }
  | { kind: 'notStarted' };
