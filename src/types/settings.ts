/** Auto-pause thresholds the settings screen offers, in seconds */
export const AUTO_PAUSE_THRESHOLDS = [1, 2, 5, 10, 15, 30] as const;

export type AutoPauseThresholdSeconds = (typeof AUTO_PAUSE_THRESHOLDS)[number];

export type UnitsSystem = 'metric' | 'imperial';
