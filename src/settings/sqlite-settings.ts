import type { AutoPauseThresholdSeconds, UnitsSystem } from '@/types';
import type { RideDatabase } from '@/persistence/db';
import type { SettingsProvider } from './settings';
import { parseAutoPauseThreshold, parseBoolean, parseUnitsSystem } from './settings';

const AUTO_PAUSE_THRESHOLD_KEY = 'auto_pause_threshold_seconds';
const AUTO_PAUSE_ENABLED_KEY = 'auto_pause_enabled';
const UNITS_SYSTEM_KEY = 'units_system';

/**
 * Settings persisted in the `meta` key/value table. Values are read on every
 * call, so a change made mid-ride is seen at the next evaluation.
 */
export class SqliteSettingsStore implements SettingsProvider {
  private readonly selectMeta;
  private readonly upsertMeta;

  constructor(db: RideDatabase) {
    this.selectMeta = db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?');
    this.upsertMeta = db.prepare<[string, string]>(`
      INSERT INTO meta (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `);
  }

  getAutoPauseThresholdSeconds(): AutoPauseThresholdSeconds {
    return parseAutoPauseThreshold(this.getMeta(AUTO_PAUSE_THRESHOLD_KEY));
  }

  isAutoPauseEnabled(): boolean {
    return parseBoolean(this.getMeta(AUTO_PAUSE_ENABLED_KEY), true);
  }

  getUnitsSystem(): UnitsSystem {
    return parseUnitsSystem(this.getMeta(UNITS_SYSTEM_KEY));
  }

  /** Stores whatever it is given; reads sanitize it. */
  setAutoPauseThresholdSeconds(seconds: number): void {
    this.setMeta(AUTO_PAUSE_THRESHOLD_KEY, String(seconds));
  }

  setAutoPauseEnabled(enabled: boolean): void {
    this.setMeta(AUTO_PAUSE_ENABLED_KEY, String(enabled));
  }

  setUnitsSystem(units: UnitsSystem): void {
    this.setMeta(UNITS_SYSTEM_KEY, units);
  }

  private getMeta(key: string): string | undefined {
    return this.selectMeta.get(key)?.value;
  }

  private setMeta(key: string, value: string): void {
    this.upsertMeta.run(key, value);
  }
}
