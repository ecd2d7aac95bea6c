export * from './types';

export { validateFix } from './gps/fix-validator';
export { estimateSpeed } from './gps/speed-estimator';
export { BearingSmoother } from './gps/bearing-smoother';
export type { BearingSmootherOptions } from './gps/bearing-smoother';
export { gpsStatus, isSilent } from './gps/gps-status';
export { haversineDistance, fixDistance, initialBearing, routeDistance } from './gps/geo-math';
export * from './gps/providers';

export { transition, isPaused, isActive } from './ride/state-machine';
export { RideAccumulator } from './ride/accumulator';
export { PauseTimer } from './ride/pause-timer';
export type { PauseTickListener } from './ride/pause-timer';
export { finishRide, summarizeRide, generateRideName, averageSpeedKmh } from './ride/finish';
export { RideRecorder } from './ride/recorder';
export type { RideRecorderOptions, RideUpdateCallback } from './ride/recorder';
export { replayRide, parseFixTrack } from './ride/replay';
export type { ReplayRideOptions, ReplayRideResult } from './ride/replay';

export { simplifyRoute, routeBounds, RouteGeometryCache } from './route/geometry';

export {
  InMemorySettingsProvider,
  parseAutoPauseThreshold,
  parseUnitsSystem,
  parseBoolean
} from './settings/settings';
export type { SettingsProvider } from './settings/settings';
export { SqliteSettingsStore } from './settings/sqlite-settings';

export { openRideDatabase } from './persistence/db';
export type { RideDatabase } from './persistence/db';
export { InMemoryRideRepository } from './persistence/repository';
export type { RideRepository } from './persistence/repository';
export { SqliteRideRepository } from './persistence/sqlite-repository';

export { loadConfig, ConfigError } from './config';
export type { RecorderConfig } from './config';
export { formatDuration, formatSpeed, formatDistance, toMph, toMiles, KM_TO_MILES } from './utils/format';
