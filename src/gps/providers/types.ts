import type { LocationFix } from '@/types';

/** Callback invoked on each new fix */
export type GpsCallback = (fix: LocationFix) => void;

/** Callback invoked when the source fails or location is switched off */
export type GpsErrorCallback = (error: Error) => void;

/**
 * Abstract location source. Fixes arrive in order, roughly once a second,
 * and may simply stop arriving when the signal is lost.
 */
export interface GpsProvider {
  /** Request location permissions. Returns true if granted. */
  requestPermissions(): Promise<boolean>;

  /** Start watching for GPS updates. Calls onFix for each fix. */
  startWatching(onFix: GpsCallback, onError: GpsErrorCallback): void;

  /** Stop watching for GPS updates. */
  stopWatching(): void;
}

/** Raised by a provider when location services go away mid-ride */
export class LocationUnavailableError extends Error {
  constructor(message = 'Location services disabled') {
    super(message);
    this.name = 'LocationUnavailableError';
  }
}
