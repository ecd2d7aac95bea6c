/** Speeds above this are treated as GPS glitches and clamped (km/h) */
export const MAX_SPEED_KMH = 100;

/** Speeds below this are GPS jitter and count as stationary (km/h) */
export const STATIONARY_SPEED_KMH = 1;

export const MAX_SPEED_MPS = MAX_SPEED_KMH / 3.6;
export const STATIONARY_SPEED_MPS = STATIONARY_SPEED_KMH / 3.6;

/** Auto-pause threshold used when the stored value is missing or invalid (s) */
export const DEFAULT_AUTO_PAUSE_THRESHOLD_SECONDS = 5;

/** Bearing changes at or below this are not propagated (degrees) */
export const BEARING_DEBOUNCE_DEG = 5;

/** Heading is dropped after this long without a qualifying update (ms) */
export const BEARING_STALE_MS = 45_000;

/** First fix must be at least this accurate to start recording (m) */
export const ACQUISITION_ACCURACY_METERS = 30;

/** GPS status thresholds (m / ms) */
export const ACTIVE_ACCURACY_METERS = 10;
export const UNAVAILABLE_ACCURACY_METERS = 50;
export const FIX_SILENCE_MS = 10_000;

/** Default Douglas–Peucker tolerance for route display (m) */
export const DEFAULT_ROUTE_TOLERANCE_METERS = 10;

/** Approximate meters per degree, used to convert the simplification tolerance */
export const METERS_PER_DEGREE = 111_000;

/** Rides shorter than this are discarded on stop (ms) */
export const MIN_RIDE_DURATION_MS = 5_000;

/** Pause counter refresh interval (ms) */
export const PAUSE_TICK_MS = 1_000;
