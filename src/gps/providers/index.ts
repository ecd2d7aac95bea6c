export type { GpsProvider, GpsCallback, GpsErrorCallback } from './types';
export { LocationUnavailableError } from './types';
export { MockGpsProvider } from './mock-provider';
export { ReplayGpsProvider } from './replay-provider';
