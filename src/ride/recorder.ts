import type {
  FinishRideResult,
  LatLng,
  LocationFix,
  PauseKind,
  RideEvent,
  RideSession,
  RideSnapshot,
  RideState,
  SpeedSample
} from '@/types';
import type { GpsProvider } from '@/gps/providers/types';
import type { SettingsProvider } from '@/settings/settings';
import type { RideRepository } from '@/persistence/repository';
import { LocationUnavailableError } from '@/gps/providers/types';
import { validateFix } from '@/gps/fix-validator';
import { estimateSpeed } from '@/gps/speed-estimator';
import { BearingSmoother, type BearingSmootherOptions } from '@/gps/bearing-smoother';
import { gpsStatus, isSilent } from '@/gps/gps-status';
import { RouteGeometryCache } from '@/route/geometry';
import {
  ACQUISITION_ACCURACY_METERS,
  DEFAULT_ROUTE_TOLERANCE_METERS,
  MIN_RIDE_DURATION_MS
} from '@/constants/ride';
import { RideAccumulator } from './accumulator';
import { PauseTimer } from './pause-timer';
import { finishRide } from './finish';
import { isActive, isPaused, transition } from './state-machine';

export type RideUpdateCallback = (data: RideSnapshot) => void;

export interface RideRecorderOptions {
  settings: SettingsProvider;
  repository: RideRepository;
  /** Wall clock, epoch ms */
  clock?: () => number;
  routeToleranceMeters?: number;
  acquisitionAccuracyMeters?: number;
  minRideDurationMs?: number;
  bearing?: BearingSmootherOptions;
}

/**
 * Ride recorder: validates incoming fixes, estimates speed and heading,
 * accumulates distance, runs the manual/auto pause state machine, and
 * exposes a live snapshot.
 *
 * State machine: idle -> waitingForFix -> recording <-> manuallyPaused | autoPaused -> idle
 *
 * The recorder is the only owner of the ride session. Listeners and callers
 * get copies.
 */
export class RideRecorder {
  private readonly provider: GpsProvider;
  private readonly settings: SettingsProvider;
  private readonly repository: RideRepository;
  private readonly now: () => number;
  private readonly routeToleranceMeters: number;
  private readonly acquisitionAccuracyMeters: number;
  private readonly minRideDurationMs: number;
  private readonly pauseTimer: PauseTimer;

  private state: RideState = 'idle';
  private rideId: string | null = null;
  private startedAtMs = 0;
  private points: LocationFix[] = [];
  private route: LatLng[] = [];
  private accumulator = new RideAccumulator();
  private readonly bearing: BearingSmoother;
  private routeCache = new RouteGeometryCache();
  private lastFix: LocationFix | null = null;     // last accepted fix, any state
  private lastSample: SpeedSample | null = null;
  private stationaryRunStartMs: number | null = null;
  private maxSpeedKmh = 0;
  private rejectedFixCount = 0;
  private locationAvailable = true;
  private listeners: RideUpdateCallback[] = [];

  constructor(provider: GpsProvider, opts: RideRecorderOptions) {
    this.provider = provider;
    this.settings = opts.settings;
    this.repository = opts.repository;
    this.now = opts.clock ?? Date.now;
    this.routeToleranceMeters = opts.routeToleranceMeters ?? DEFAULT_ROUTE_TOLERANCE_METERS;
    this.acquisitionAccuracyMeters = opts.acquisitionAccuracyMeters ?? ACQUISITION_ACCURACY_METERS;
    this.minRideDurationMs = opts.minRideDurationMs ?? MIN_RIDE_DURATION_MS;
    this.bearing = new BearingSmoother(opts.bearing);
    this.pauseTimer = new PauseTimer(this.now);
    this.pauseTimer.subscribe(() => this.notify());
  }

  /** Register a listener for snapshot updates */
  onUpdate(cb: RideUpdateCallback): void {
    this.listeners.push(cb);
  }

  /** Remove a listener */
  offUpdate(cb: RideUpdateCallback): void {
    this.listeners = this.listeners.filter(l => l !== cb);
  }

  /**
   * Listen to the live pause counter. Called at once with the current value
   * if a pause is running, then about every second until it ends.
   */
  onPauseTick(cb: (elapsedMs: number) => void): () => void {
    return this.pauseTimer.subscribe(cb);
  }

  getState(): RideState {
    return this.state;
  }

  getPoints(): LocationFix[] {
    return [...this.points];
  }

  /** Copy of the current session, or null when no ride is active */
  getSession(): RideSession | null {
    if (this.rideId === null) return null;
    return {
      id: this.rideId,
      state: this.state,
      startedAtMs: this.startedAtMs,
      movingDistanceMeters: this.accumulator.movingDistanceMeters,
      movingDurationMs: this.accumulator.movingDurationMs,
      pausedDurationMs: this.accumulator.pausedDurationMs,
      manualPausedDurationMs: this.accumulator.manualPausedDurationMs,
      autoPausedDurationMs: this.accumulator.autoPausedDurationMs,
      currentPauseStartMs: this.accumulator.currentPauseStartMs,
      maxSpeedKmh: this.maxSpeedKmh,
      rejectedFixCount: this.rejectedFixCount,
      points: [...this.points],
    };
  }

  /** Current snapshot, with time-dependent values computed as of now */
  getLiveData(): RideSnapshot {
    const now = this.now();
    const silent = this.lastFix !== null && isSilent(this.lastFix, now);
    const showSpeed = isActive(this.state) && this.lastSample !== null && !silent;

    return {
      state: this.state,
      rideId: this.rideId,
      movingDistanceMeters: this.accumulator.movingDistanceMeters,
      movingDurationMs: this.accumulator.movingDurationMs,
      currentSpeedKmh: showSpeed && this.lastSample ? this.lastSample.speedKmh : 0,
      speedSource: showSpeed && this.lastSample ? this.lastSample.source : 'unknown',
      pausedDurationMs: this.accumulator.totalPausedMs(now),
      currentPauseElapsedMs: this.accumulator.currentPauseElapsedMs(now),
      simplifiedRoute: this.routeCache.simplify(this.route, this.routeToleranceMeters),
      bounds: this.routeCache.boundsOf(this.route),
      bearing: this.bearing.current(now),
      gpsStatus: gpsStatus(this.lastFix, now, this.locationAvailable),
      pointCount: this.points.length,
      rejectedFixCount: this.rejectedFixCount,
    };
  }

  /**
   * Start a ride. Resolves false if a ride is already running or location
   * permission is refused; in the latter case the ride stays waiting for a
   * fix and reports GPS as unavailable.
   */
  async start(): Promise<boolean> {
    if (!this.apply('startRide')) return false;

    this.resetSession();
    this.notify();

    const rideId = this.rideId;
    const granted = await this.provider.requestPermissions();
    // Stopped (or restarted) while waiting for the permission prompt
    if (this.rideId !== rideId || this.state !== 'waitingForFix') return false;

    if (!granted) {
      console.warn('Location permission denied; waiting for fix');
      this.locationAvailable = false;
      this.notify();
      return false;
    }

    this.provider.startWatching(
      (fix) => this.handleFix(fix),
      (error) => this.handleError(error)
    );
    return true;
  }

  /** Manual pause */
  pause(): void {
    if (this.enterPause('manual')) this.notify();
  }

  /** Resume from a manual pause */
  resume(): void {
    if (this.exitPause('manualResume')) this.notify();
  }

  /**
   * Stop the ride. Pause accounting is flushed and the pause counter
   * cancelled before the session is handed to the repository.
   */
  stop(): FinishRideResult {
    const wasActive = isActive(this.state);
    const wasPaused = isPaused(this.state);
    if (!this.apply('stopRide')) return { kind: 'notStarted' };

    const endedAtMs = this.now();
    if (wasPaused) this.accumulator.endPause(endedAtMs);
    this.pauseTimer.stop();
    this.provider.stopWatching();

    const session = this.getSession();
    this.rideId = null;

    let result: FinishRideResult = { kind: 'notStarted' };
    if (wasActive && session) {
      result = finishRide(session, endedAtMs, this.minRideDurationMs);
      this.handOff(session.id, result);
    }

    this.notify();
    return result;
  }

  /** Process an incoming fix */
  private handleFix(raw: LocationFix): void {
    if (this.state === 'idle') return;

    const validation = validateFix(raw, this.lastFix?.timestampMs ?? null);
    if (!validation.ok) {
      this.rejectedFixCount++;
      console.debug(`Rejected fix (${validation.reason})`);
      return;
    }

    const fix = validation.fix;
    const previous = this.lastFix;
    this.locationAvailable = true;
    this.lastFix = fix;

    if (this.state === 'waitingForFix') {
      if (fix.accuracyMeters > this.acquisitionAccuracyMeters) {
        // Keep the fix for the status indicator, wait for a better one
        this.notify();
        return;
      }
      this.apply('firstValidFix');
    }

    const sample = estimateSpeed(fix, previous);
    this.lastSample = sample;
    this.bearing.update(fix, previous, !sample.isStationary);

    switch (this.state) {
      case 'recording':
        this.record(fix, sample);
        this.evaluateAutoPause(sample);
        break;
      case 'autoPaused':
        if (isMoving(sample) && this.exitPause('motionResumes')) {
          this.record(fix, sample);
        }
        break;
      default:
        // manually paused: speed and heading stay live, nothing is recorded
        break;
    }

    this.notify();
  }

  /** Any provider error marks location unavailable until the next accepted fix */
  private handleError(error: Error): void {
    if (error instanceof LocationUnavailableError) {
      console.warn('Location unavailable:', error.message);
    } else {
      console.error('GPS error:', error);
    }
    this.locationAvailable = false;
    this.notify();
  }

  private record(fix: LocationFix, sample: SpeedSample): void {
    this.points.push(fix);
    this.route.push([fix.latitude, fix.longitude]);
    this.accumulator.addFix(fix);
    this.maxSpeedKmh = Math.max(this.maxSpeedKmh, sample.speedKmh);

    if (this.rideId === null) return;
    try {
      this.repository.appendFix(this.rideId, fix);
    } catch (e) {
      console.error('Error saving fix:', e);
    }
  }

  /**
   * Track the run of consecutive stationary samples and auto-pause once it
   * spans the configured threshold. Settings are read fresh on every call.
   */
  private evaluateAutoPause(sample: SpeedSample): void {
    if (!this.settings.isAutoPauseEnabled()) {
      this.stationaryRunStartMs = null;
      return;
    }
    // No speed information: neither extends nor breaks the run
    if (sample.source === 'unknown') return;

    if (!sample.isStationary) {
      this.stationaryRunStartMs = null;
      return;
    }

    if (this.stationaryRunStartMs === null) {
      this.stationaryRunStartMs = sample.timestampMs;
    }
    const thresholdMs = this.settings.getAutoPauseThresholdSeconds() * 1000;
    if (sample.timestampMs - this.stationaryRunStartMs >= thresholdMs) {
      this.enterPause('auto');
    }
  }

  private enterPause(kind: PauseKind): boolean {
    if (!this.apply(kind === 'manual' ? 'manualPause' : 'autoPause')) return false;
    const startMs = this.now();
    this.accumulator.beginPause(kind, startMs);
    this.stationaryRunStartMs = null;
    this.pauseTimer.start(startMs);
    return true;
  }

  private exitPause(event: 'manualResume' | 'motionResumes'): boolean {
    if (!this.apply(event)) return false;
    this.pauseTimer.stop();
    this.accumulator.endPause(this.now());
    return true;
  }

  /** Run an event through the state machine. Invalid events are logged and ignored. */
  private apply(event: RideEvent): boolean {
    const next = transition(this.state, event);
    if (next === null) {
      console.warn(`Ignoring ${event} while ${this.state}`);
      return false;
    }
    this.state = next;
    return true;
  }

  private resetSession(): void {
    this.startedAtMs = this.now();
    this.rideId = `ride_${this.startedAtMs}`;
    this.points = [];
    this.route = [];
    this.accumulator = new RideAccumulator();
    this.bearing.reset();
    this.routeCache.reset();
    this.lastFix = null;
    this.lastSample = null;
    this.stationaryRunStartMs = null;
    this.maxSpeedKmh = 0;
    this.rejectedFixCount = 0;
    this.locationAvailable = true;
  }

  /** Save a finished ride, or drop the fixes of one that was too short */
  private handOff(rideId: string, result: FinishRideResult): void {
    try {
      if (result.kind === 'saved') {
        this.repository.saveRide(result.summary);
      } else {
        this.repository.deleteRide(rideId);
      }
    } catch (e) {
      console.error('Error saving ride:', e);
    }
  }

  /** Notify all listeners */
  private notify(): void {
    if (this.listeners.length === 0) return;
    const data = this.getLiveData();
    for (const cb of this.listeners) {
      cb(data);
    }
  }
}

function isMoving(sample: SpeedSample): boolean {
  return !sample.isStationary && sample.source !== 'unknown';
}
