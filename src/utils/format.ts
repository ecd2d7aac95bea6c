import type { UnitsSystem } from '@/types';

/** km/h -> mph, also km -> mi */
export const KM_TO_MILES = 0.621371;

export function toMph(kmh: number): number {
  return kmh * KM_TO_MILES;
}

export function toMiles(km: number): number {
  return km * KM_TO_MILES;
}

/**
 * Format a duration in ms as h:mm:ss, or m:ss under an hour.
 * Partial seconds are dropped, negatives read as zero.
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms <= 0) return '0:00';
  const total = Math.floor(ms / 1000);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const sec = total % 60;
  return h > 0
    ? `${h}:${String(m).padStart(2, '0')}:${String(sec).padStart(2, '0')}`
    : `${m}:${String(sec).padStart(2, '0')}`;
}

/**
 * Format speed with units
 * @param kmh - Speed in km/h
 * @returns e.g. "24.5 km/h" or "15.2 mph"
 */
export function formatSpeed(kmh: number, units: UnitsSystem = 'metric'): string {
  if (units === 'imperial') return `${toMph(kmh).toFixed(1)} mph`;
  return `${kmh.toFixed(1)} km/h`;
}

/**
 * Format distance with units
 * @param meters - Distance in meters
 * @returns e.g. "12.34 km" or "7.67 mi"
 */
export function formatDistance(meters: number, units: UnitsSystem = 'metric'): string {
  const km = meters / 1000;
  if (units === 'imperial') return `${toMiles(km).toFixed(2)} mi`;
  return `${km.toFixed(2)} km`;
}
