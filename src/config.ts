import { z } from 'zod';
import {
  ACQUISITION_ACCURACY_METERS,
  BEARING_STALE_MS,
  DEFAULT_ROUTE_TOLERANCE_METERS,
  MIN_RIDE_DURATION_MS
} from '@/constants/ride';

const EnvSchema = z.object({
  RIDE_DB_PATH: z.string().trim().min(1).optional(),
  ROUTE_TOLERANCE_METERS: z.coerce.number().positive().default(DEFAULT_ROUTE_TOLERANCE_METERS),
  BEARING_STALE_MS: z.coerce.number().int().positive().default(BEARING_STALE_MS),
  ACQUISITION_ACCURACY_METERS: z.coerce.number().positive().default(ACQUISITION_ACCURACY_METERS),
  MIN_RIDE_DURATION_MS: z.coerce.number().int().nonnegative().default(MIN_RIDE_DURATION_MS),
});

export interface RecorderConfig {
  /** SQLite file for rides and settings; rides stay in memory when unset */
  dbPath: string | null;
  routeToleranceMeters: number;
  bearingStaleMs: number;
  acquisitionAccuracyMeters: number;
  minRideDurationMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Read recorder configuration from environment variables. Empty values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RecorderConfig {
  const raw = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const cfg = parsed.data;
  return {
    dbPath: cfg.RIDE_DB_PATH ?? null,
    routeToleranceMeters: cfg.ROUTE_TOLERANCE_METERS,
    bearingStaleMs: cfg.BEARING_STALE_MS,
    acquisitionAccuracyMeters: cfg.ACQUISITION_ACCURACY_METERS,
    minRideDurationMs: cfg.MIN_RIDE_DURATION_MS,
  };
}
