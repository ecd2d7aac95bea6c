import type { LocationFix } from '@/types';
import type { GpsProvider, GpsCallback, GpsErrorCallback } from './types';

type ReplayOptions = {
  intervalMs?: number;    // wall time between emitted fixes
  rebaseTimestamps?: boolean; // shift timestamps so the first fix is "now"
};

/**
 * Replays a recorded list of fixes on a timer, as if they came from a device.
 * Used by the replay script and for manual testing without hardware.
 */
export class ReplayGpsProvider implements GpsProvider {
  private readonly fixes: readonly LocationFix[];
  private readonly opts: Required<ReplayOptions>;
  private timer: ReturnType<typeof setInterval> | null = null;
  private i = 0;
  private offsetMs = 0;
  private lastEmittedMs: number | null = null;
  private onDone: (() => void) | null = null;

  constructor(fixes: readonly LocationFix[], opts: ReplayOptions = {}) {
    this.fixes = fixes;
    this.opts = {
      intervalMs: opts.intervalMs ?? 1000,
      rebaseTimestamps: opts.rebaseTimestamps ?? false,
    };
  }

  async requestPermissions(): Promise<boolean> {
    return true;
  }

  startWatching(onFix: GpsCallback, _onError: GpsErrorCallback): void {
    if (this.timer || this.fixes.length === 0) return;
    this.i = 0;
    this.lastEmittedMs = null;
    const offset = this.opts.rebaseTimestamps ? Date.now() - this.fixes[0].timestampMs : 0;
    this.offsetMs = offset;

    this.timer = setInterval(() => {
      const fix = this.fixes[this.i];
      const timestampMs = fix.timestampMs + offset;
      this.lastEmittedMs = timestampMs;
      onFix(offset === 0 ? fix : { ...fix, timestampMs });
      this.i += 1;
      if (this.i >= this.fixes.length) this.finish();
    }, this.opts.intervalMs);
  }

  stopWatching(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Clock that follows the replayed track: the timestamp of the last emitted
   * fix, or of the first one before anything is emitted. Lets a recorder
   * replay a long ride faster than real time.
   */
  clock(): number {
    if (this.lastEmittedMs !== null) return this.lastEmittedMs;
    if (this.fixes.length === 0) return Date.now();
    return this.fixes[0].timestampMs + this.offsetMs;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Register a callback for when the last fix has been emitted */
  onFinished(cb: () => void): void {
    this.onDone = cb;
  }

  private finish(): void {
    this.stopWatching();
    if (this.onDone) this.onDone();
  }
}
