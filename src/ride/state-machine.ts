import type { RideEvent, RideState } from '@/types';

/**
 * Ride state transitions.
 *
 *   idle --startRide--> waitingForFix --firstValidFix--> recording
 *   recording --manualPause--> manuallyPaused --manualResume--> recording
 *   recording --autoPause--> autoPaused --motionResumes--> recording
 *   any active state --stopRide--> idle
 *
 * Returns the next state, or null when the event does not apply.
 */
export function transition(state: RideState, event: RideEvent): RideState | null {
  switch (state) {
    case 'idle':
      return event === 'startRide' ? 'waitingForFix' : null;
    case 'waitingForFix':
      if (event === 'firstValidFix') return 'recording';
      if (event === 'stopRide') return 'idle';
      return null;
    case 'recording':
      if (event === 'manualPause') return 'manuallyPaused';
      if (event === 'autoPause') return 'autoPaused';
      if (event === 'stopRide') return 'idle';
      return null;
    case 'manuallyPaused':
      if (event === 'manualResume') return 'recording';
      if (event === 'stopRide') return 'idle';
      return null;
    case 'autoPaused':
      if (event === 'motionResumes') return 'recording';
      if (event === 'stopRide') return 'idle';
      return null;
    default:
      return assertNever(state);
  }
}

export function isPaused(state: RideState): state is 'manuallyPaused' | 'autoPaused' {
  return state === 'manuallyPaused' || state === 'autoPaused';
}

/** Recording or paused: a ride exists and has received its first fix */
export function isActive(state: RideState): boolean {
  return state === 'recording' || isPaused(state);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled ride state: ${String(value)}`);
}
