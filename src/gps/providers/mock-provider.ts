import type { LocationFix } from '@/types';
import type { GpsProvider, GpsCallback, GpsErrorCallback } from './types';

interface Subscription {
  onFix: GpsCallback;
  onError: GpsErrorCallback;
}

/**
 * In-process location source for tests. Fixes and errors are pushed by hand
 * and delivered synchronously; anything pushed while nobody is watching is
 * counted as dropped, like a device with its receiver off.
 */
export class MockGpsProvider implements GpsProvider {
  private subscription: Subscription | null = null;

  permissionGranted = true;
  permissionRequests = 0;
  dropped = 0;

  async requestPermissions(): Promise<boolean> {
    this.permissionRequests++;
    return this.permissionGranted;
  }

  startWatching(onFix: GpsCallback, onError: GpsErrorCallback): void {
    this.subscription = { onFix, onError };
  }

  stopWatching(): void {
    this.subscription = null;
  }

  get isWatching(): boolean {
    return this.subscription !== null;
  }

  /** Deliver fixes in order */
  pushFix(...fixes: LocationFix[]): void {
    for (const fix of fixes) {
      if (this.subscription) this.subscription.onFix(fix);
      else this.dropped++;
    }
  }

  pushError(error: Error): void {
    if (this.subscription) this.subscription.onError(error);
    else this.dropped++;
  }
}
