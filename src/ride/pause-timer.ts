import { PAUSE_TICK_MS } from '@/constants/ride';

export type PauseTickListener = (elapsedMs: number) => void;

/**
 * Live pause counter.
 *
 * Each wake recomputes `now - pauseStart` from the clock, and the next wake
 * is aligned to the next whole second of the pause. If the process was
 * suspended, the first wake afterwards shows the true elapsed time.
 */
export class PauseTimer {
  private readonly now: () => number;
  private readonly tickMs: number;
  private pauseStartMs: number | null = null;
  private timeout: ReturnType<typeof setTimeout> | null = null;
  private listeners: PauseTickListener[] = [];

  constructor(now: () => number = Date.now, tickMs: number = PAUSE_TICK_MS) {
    this.now = now;
    this.tickMs = tickMs;
  }

  get running(): boolean {
    return this.pauseStartMs !== null;
  }

  /** Elapsed pause time right now, or null when stopped */
  elapsedMs(): number | null {
    if (this.pauseStartMs === null) return null;
    return Math.max(0, this.now() - this.pauseStartMs);
  }

  /** Start counting from pauseStartMs. Restarts if already running. */
  start(pauseStartMs: number): void {
    this.clearWake();
    this.pauseStartMs = pauseStartMs;
    this.wake();
  }

  /** Stop counting. No emission happens after this returns. */
  stop(): void {
    this.clearWake();
    this.pauseStartMs = null;
  }

  /**
   * Listen for ticks. While running, the listener is called straight away
   * with the current value. Returns an unsubscribe function.
   */
  subscribe(listener: PauseTickListener): () => void {
    this.listeners.push(listener);
    const elapsed = this.elapsedMs();
    if (elapsed !== null) listener(elapsed);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private wake(): void {
    const elapsed = this.elapsedMs();
    if (elapsed === null) return;
    for (const listener of this.listeners) {
      listener(elapsed);
    }
    // A listener may have stopped the timer
    if (this.pauseStartMs === null) return;
    const delay = this.tickMs - (elapsed % this.tickMs);
    this.timeout = setTimeout(() => {
      this.timeout = null;
      this.wake();
    }, delay);
  }

  private clearWake(): void {
    if (this.timeout !== null) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
  }
}
