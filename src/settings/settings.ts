import { AUTO_PAUSE_THRESHOLDS } from '@/types';
import type { AutoPauseThresholdSeconds, UnitsSystem } from '@/types';
import { DEFAULT_AUTO_PAUSE_THRESHOLD_SECONDS } from '@/constants/ride';

/**
 * Read-only settings the recorder consults. Every call is a fresh snapshot;
 * the recorder never caches these between evaluations.
 */
export interface SettingsProvider {
  getAutoPauseThresholdSeconds(): AutoPauseThresholdSeconds;
  isAutoPauseEnabled(): boolean;
  getUnitsSystem(): UnitsSystem;
}

/**
 * Coerce a stored threshold to one of the offered values.
 * Anything else (missing, garbage, a retired option) falls back to 5 s.
 */
export function parseAutoPauseThreshold(raw: unknown): AutoPauseThresholdSeconds {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  const match = AUTO_PAUSE_THRESHOLDS.find(t => t === value);
  return match ?? DEFAULT_AUTO_PAUSE_THRESHOLD_SECONDS;
}

export function parseUnitsSystem(raw: unknown): UnitsSystem {
  return raw === 'imperial' ? 'imperial' : 'metric';
}

export function parseBoolean(raw: unknown, fallback: boolean): boolean {
  if (raw === true || raw === 'true' || raw === '1') return true;
  if (raw === false || raw === 'false' || raw === '0') return false;
  return fallback;
}

/** Settings kept in memory. Accepts raw values the way a settings screen would store them. */
export class InMemorySettingsProvider implements SettingsProvider {
  autoPauseThreshold: unknown;
  autoPauseEnabled: boolean;
  unitsSystem: UnitsSystem;

  constructor(opts: { autoPauseThreshold?: unknown; autoPauseEnabled?: boolean; unitsSystem?: UnitsSystem } = {}) {
    this.autoPauseThreshold = opts.autoPauseThreshold ?? DEFAULT_AUTO_PAUSE_THRESHOLD_SECONDS;
    this.autoPauseEnabled = opts.autoPauseEnabled ?? true;
    this.unitsSystem = opts.unitsSystem ?? 'metric';
  }

  getAutoPauseThresholdSeconds(): AutoPauseThresholdSeconds {
    return parseAutoPauseThreshold(this.autoPauseThreshold);
  }

  isAutoPauseEnabled(): boolean {
    return this.autoPauseEnabled;
  }

  getUnitsSystem(): UnitsSystem {
    return this.unitsSystem;
  }
}
