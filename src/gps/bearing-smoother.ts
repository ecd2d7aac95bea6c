import type { BearingEstimate, LocationFix } from '@/types';
import { BEARING_DEBOUNCE_DEG, BEARING_STALE_MS } from '@/constants/ride';
import { angleDelta, initialBearing } from './geo-math';

export interface BearingSmootherOptions {
  debounceDeg?: number;
  staleAfterMs?: number;
}

/**
 * Tracks the rider's heading for the map marker.
 *
 * The reported bearing wins; otherwise, while the rider is moving, the
 * heading is derived from the previous fix to the current one. Position
 * jitter while stationary never turns the marker. Changes of `debounceDeg` or less are held
 * back, and the heading is dropped once nothing has updated it for
 * `staleAfterMs`.
 */
export class BearingSmoother {
  private readonly debounceDeg: number;
  private readonly staleAfterMs: number;
  private emitted: number | null = null;
  private lastUpdatedMs = 0;

  constructor(opts: BearingSmootherOptions = {}) {
    this.debounceDeg = opts.debounceDeg ?? BEARING_DEBOUNCE_DEG;
    this.staleAfterMs = opts.staleAfterMs ?? BEARING_STALE_MS;
  }

  /** Feed a fix. Returns the estimate consumers should display. */
  update(fix: LocationFix, previous: LocationFix | null, moving: boolean = true): BearingEstimate {
    const raw = rawBearing(fix, moving ? previous : null);
    if (raw === null) return this.current(fix.timestampMs);

    // A stale heading is gone, so the next one is shown straight away
    if (this.isStale(fix.timestampMs)) this.emitted = null;

    if (this.emitted === null || angleDelta(raw, this.emitted) > this.debounceDeg) {
      this.emitted = raw;
    }
    this.lastUpdatedMs = fix.timestampMs;
    return this.current(fix.timestampMs);
  }

  /** Estimate as of `nowMs`, with staleness applied. */
  current(nowMs: number): BearingEstimate {
    if (this.isStale(nowMs)) {
      return { degrees: null, lastUpdatedMs: this.lastUpdatedMs };
    }
    return { degrees: this.emitted, lastUpdatedMs: this.lastUpdatedMs };
  }

  /** Forget the heading, e.g. when a new ride starts */
  reset(): void {
    this.emitted = null;
    this.lastUpdatedMs = 0;
  }

  private isStale(nowMs: number): boolean {
    return this.emitted !== null && nowMs - this.lastUpdatedMs > this.staleAfterMs;
  }
}

function rawBearing(fix: LocationFix, previous: LocationFix | null): number | null {
  if (fix.reportedBearingDeg !== null) return fix.reportedBearingDeg;
  if (!previous) return null;
  if (previous.latitude === fix.latitude && previous.longitude === fix.longitude) return null;
  return initialBearing(previous.latitude, previous.longitude, fix.latitude, fix.longitude);
}
