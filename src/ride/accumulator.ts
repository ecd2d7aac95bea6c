import type { LocationFix, PauseKind } from '@/types';
import { fixDistance } from '@/gps/geo-math';

/**
 * Running totals for a ride: moving distance and time, plus paused time
 * split by manual and automatic pauses.
 *
 * Movement is measured between consecutive recorded fixes. An auto-pause
 * keeps the segment open: the rider was standing still, so the first fix
 * after it adds its distance from the last recorded point, and only the time
 * since the pause ended. A manual pause closes the segment, since the rider
 * may have moved (walked the bike) while paused.
 */
export class RideAccumulator {
  private _movingDistanceMeters = 0;
  private _movingDurationMs = 0;
  private _manualPausedMs = 0;
  private _autoPausedMs = 0;
  private _pauseStartMs: number | null = null;
  private _pauseKind: PauseKind | null = null;
  private segmentAnchor: LocationFix | null = null;
  private resumedAtMs: number | null = null;

  get movingDistanceMeters(): number {
    return this._movingDistanceMeters;
  }

  get movingDurationMs(): number {
    return this._movingDurationMs;
  }

  get manualPausedDurationMs(): number {
    return this._manualPausedMs;
  }

  get autoPausedDurationMs(): number {
    return this._autoPausedMs;
  }

  /** Completed pauses only */
  get pausedDurationMs(): number {
    return this._manualPausedMs + this._autoPausedMs;
  }

  get currentPauseStartMs(): number | null {
    return this._pauseStartMs;
  }

  /**
   * Add a recorded fix. Returns the distance it contributed (0 for the
   * first fix of a segment).
   */
  addFix(fix: LocationFix): number {
    const anchor = this.segmentAnchor;
    const resumedAtMs = this.resumedAtMs;
    this.segmentAnchor = fix;
    this.resumedAtMs = null;
    if (!anchor) return 0;

    let durationMs = fix.timestampMs - anchor.timestampMs;
    // Bridging a pause: the paused time is already counted as paused
    if (resumedAtMs !== null) durationMs = Math.min(durationMs, fix.timestampMs - resumedAtMs);

    const dist = fixDistance(anchor, fix);
    this._movingDistanceMeters += dist;
    this._movingDurationMs += Math.max(0, durationMs);
    return dist;
  }

  beginPause(kind: PauseKind, nowMs: number): void {
    if (this._pauseStartMs !== null) return;
    this._pauseStartMs = nowMs;
    this._pauseKind = kind;
    if (kind === 'manual') this.segmentAnchor = null;
  }

  /** Close the running pause. Returns its length in ms (0 if none). */
  endPause(nowMs: number): number {
    if (this._pauseStartMs === null) return 0;
    // Clock adjustments must not make paused time shrink
    const elapsed = Math.max(0, nowMs - this._pauseStartMs);
    if (this._pauseKind === 'auto') {
      this._autoPausedMs += elapsed;
    } else {
      this._manualPausedMs += elapsed;
    }
    this._pauseStartMs = null;
    this._pauseKind = null;
    this.resumedAtMs = nowMs;
    return elapsed;
  }

  /** Length of the running pause as of nowMs, or null when not paused */
  currentPauseElapsedMs(nowMs: number): number | null {
    if (this._pauseStartMs === null) return null;
    return Math.max(0, nowMs - this._pauseStartMs);
  }

  /** Paused time including the running pause */
  totalPausedMs(nowMs: number): number {
    return this.pausedDurationMs + (this.currentPauseElapsedMs(nowMs) ?? 0);
  }
}
