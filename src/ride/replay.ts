import { z } from 'zod';
import type { FinishRideResult, LocationFix, RideSnapshot } from '@/types';
import type { SettingsProvider } from '@/settings/settings';
import type { RideRepository } from '@/persistence/repository';
import type { RecorderConfig } from '@/config';
import { ReplayGpsProvider } from '@/gps/providers/replay-provider';
import { RideRecorder } from './recorder';

export const LocationFixSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  accuracyMeters: z.number(),
  timestampMs: z.number(),
  reportedSpeedMps: z.number().nullable().default(null),
  reportedBearingDeg: z.number().nullable().default(null),
});

export const FixTrackSchema = z.array(LocationFixSchema);

/**
 * Parse a recorded track. Only the shape is checked here; range and ordering
 * problems are left to the fix validator, as they would be from a device.
 */
export function parseFixTrack(raw: unknown): LocationFix[] {
  const parsed = FixTrackSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(`Invalid fix track at ${first.path.join('.')}: ${first.message}`);
  }
  return parsed.data;
}

export interface ReplayRideOptions {
  settings: SettingsProvider;
  repository: RideRepository;
  config?: Partial<Omit<RecorderConfig, 'dbPath'>>;
  /** Wall time between replayed fixes */
  intervalMs?: number;
}

export interface ReplayRideResult {
  result: FinishRideResult;
  /** Snapshot taken just before the ride was stopped */
  finalSnapshot: RideSnapshot;
}

/**
 * Record a ride from a stored track and stop it after the last fix.
 * The recorder runs on the track's own clock, so a long ride replays at
 * `intervalMs` per fix with its real durations.
 */
export function replayRide(fixes: readonly LocationFix[], opts: ReplayRideOptions): Promise<ReplayRideResult> {
  const provider = new ReplayGpsProvider(fixes, { intervalMs: opts.intervalMs ?? 1 });
  const config = opts.config ?? {};
  const recorder = new RideRecorder(provider, {
    settings: opts.settings,
    repository: opts.repository,
    clock: () => provider.clock(),
    routeToleranceMeters: config.routeToleranceMeters,
    acquisitionAccuracyMeters: config.acquisitionAccuracyMeters,
    minRideDurationMs: config.minRideDurationMs,
    bearing: { staleAfterMs: config.bearingStaleMs },
  });

  return new Promise((resolve, reject) => {
    if (fixes.length === 0) {
      reject(new Error('Fix track is empty'));
      return;
    }
    provider.onFinished(() => {
      const finalSnapshot = recorder.getLiveData();
      resolve({ result: recorder.stop(), finalSnapshot });
    });
    recorder.start().then(
      (started) => {
        if (!started) reject(new Error('Ride did not start'));
      },
      reject
    );
  });
}
