/**
 * Replay a recorded track through the ride recorder and print the result.
 *
 *   npm run replay -- [track.json]
 *
 * Settings and rides go to RIDE_DB_PATH when set (see .env), otherwise they
 * are kept in memory for the run.
 */
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '../config';
import { openRideDatabase } from '../persistence/db';
import { InMemoryRideRepository } from '../persistence/repository';
import type { RideRepository } from '../persistence/repository';
import { SqliteRideRepository } from '../persistence/sqlite-repository';
import { InMemorySettingsProvider } from '../settings/settings';
import type { SettingsProvider } from '../settings/settings';
import { SqliteSettingsStore } from '../settings/sqlite-settings';
import { parseFixTrack, replayRide } from '../ride/replay';
import { formatDistance, formatDuration, formatSpeed } from '../utils/format';

const DEFAULT_TRACK = fileURLToPath(new URL('./fixtures/sample-ride.json', import.meta.url));

async function main(): Promise<void> {
  const config = loadConfig();
  const trackPath = process.argv[2] ?? DEFAULT_TRACK;
  const fixes = parseFixTrack(JSON.parse(readFileSync(trackPath, 'utf8')));

  let settings: SettingsProvider = new InMemorySettingsProvider();
  let repository: RideRepository = new InMemoryRideRepository();
  if (config.dbPath) {
    const db = openRideDatabase(config.dbPath);
    settings = new SqliteSettingsStore(db);
    repository = new SqliteRideRepository(db);
  }

  console.log(`Replaying ${fixes.length} fixes from ${trackPath}`);
  const { result, finalSnapshot } = await replayRide(fixes, { settings, repository, config });
  const units = settings.getUnitsSystem();

  switch (result.kind) {
    case 'saved': {
      const s = result.summary;
      console.log(`\n${s.name} (${s.id})`);
      console.log(`  Distance:    ${formatDistance(s.movingDistanceMeters, units)}`);
      console.log(`  Moving time: ${formatDuration(s.movingDurationMs)}`);
      console.log(`  Paused:      ${formatDuration(s.pausedDurationMs)} (manual ${formatDuration(s.manualPausedDurationMs)}, auto ${formatDuration(s.autoPausedDurationMs)})`);
      console.log(`  Avg speed:   ${formatSpeed(s.avgSpeedKmh, units)}`);
      console.log(`  Max speed:   ${formatSpeed(s.maxSpeedKmh, units)}`);
      console.log(`  Points:      ${s.pointCount} recorded, ${finalSnapshot.simplifiedRoute.points.length} after simplification, ${finalSnapshot.rejectedFixCount} rejected`);
      break;
    }
    case 'tooShort':
      console.log(`Ride too short to save (${formatDuration(result.durationMs)})`);
      break;
    case 'notStarted':
      console.log('No fix was accepted; nothing recorded');
      break;
  }
}

main().catch((e: unknown) => {
  console.error('Replay failed:', e);
  process.exitCode = 1;
});
