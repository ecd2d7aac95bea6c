import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RideRecorder } from './recorder';
import { MockGpsProvider } from '@/gps/providers/mock-provider';
import { LocationUnavailableError } from '@/gps/providers/types';
import { InMemorySettingsProvider } from '@/settings/settings';
import { InMemoryRideRepository } from '@/persistence/repository';
import { haversineDistance } from '@/gps/geo-math';
import { formatDuration } from '@/utils/format';
import type { LocationFix, RideState } from '@/types';

const T0 = 1_700_000_000_000;
const LAT = 37.7749;
const LNG = -122.4194;
const STEP = 0.0001; // ~11.1 m of latitude

/** A fix stamped with the current (fake) time */
function fixAt(
  lat: number,
  lng: number = LNG,
  reportedSpeedMps: number | null = null,
  accuracyMeters: number = 5,
  reportedBearingDeg: number | null = null
): LocationFix {
  return {
    latitude: lat,
    longitude: lng,
    accuracyMeters,
    timestampMs: Date.now(),
    reportedSpeedMps,
    reportedBearingDeg,
  };
}

function advance(ms: number): void {
  vi.advanceTimersByTime(ms);
}

describe('RideRecorder', () => {
  let provider: MockGpsProvider;
  let settings: InMemorySettingsProvider;
  let repo: InMemoryRideRepository;
  let recorder: RideRecorder;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    provider = new MockGpsProvider();
    settings = new InMemorySettingsProvider({ autoPauseThreshold: 5 });
    repo = new InMemoryRideRepository();
    recorder = new RideRecorder(provider, { settings, repository: repo });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  /** Start a ride and feed one moving fix so it is recording */
  async function startRecording(): Promise<void> {
    await recorder.start();
    provider.pushFix(fixAt(LAT, LNG, 5));
  }

  describe('state transitions', () => {
    it('starts in idle state', () => {
      expect(recorder.getState()).toBe('idle');
      expect(recorder.getSession()).toBeNull();
    });

    it('waits for a fix after start', async () => {
      expect(await recorder.start()).toBe(true);
      expect(recorder.getState()).toBe('waitingForFix');
      expect(provider.isWatching).toBe(true);
      expect(provider.permissionRequests).toBe(1);
    });

    it('starts recording on the first valid fix', async () => {
      await recorder.start();
      provider.pushFix(fixAt(LAT));
      expect(recorder.getState()).toBe('recording');
      expect(recorder.getLiveData().pointCount).toBe(1);
    });

    it('keeps waiting while the fix is too inaccurate', async () => {
      await recorder.start();
      provider.pushFix(fixAt(LAT, LNG, null, 40));
      expect(recorder.getState()).toBe('waitingForFix');
      expect(recorder.getLiveData().gpsStatus).toEqual({ kind: 'acquiring' });
      expect(recorder.getLiveData().pointCount).toBe(0);
    });

    it('returns false if start is called when not idle', async () => {
      await recorder.start();
      expect(await recorder.start()).toBe(false);
      expect(recorder.getState()).toBe('waitingForFix');
    });

    it('stays waiting and reports GPS unavailable when permission is denied', async () => {
      provider.permissionGranted = false;
      expect(await recorder.start()).toBe(false);
      expect(recorder.getState()).toBe('waitingForFix');
      expect(recorder.getLiveData().gpsStatus).toEqual({ kind: 'unavailable' });
      expect(provider.isWatching).toBe(false);

      provider.pushFix(fixAt(LAT));
      expect(provider.dropped).toBe(1);
      expect(recorder.getLiveData().pointCount).toBe(0);
    });

    it('pauses and resumes manually', async () => {
      await startRecording();
      recorder.pause();
      expect(recorder.getState()).toBe('manuallyPaused');
      recorder.resume();
      expect(recorder.getState()).toBe('recording');
    });

    it('ignores events that do not apply to the current state', async () => {
      recorder.pause();
      recorder.resume();
      expect(recorder.getState()).toBe('idle');

      await startRecording();
      recorder.resume();
      expect(recorder.getState()).toBe('recording');
      expect(console.warn).toHaveBeenCalledWith('Ignoring manualResume while recording');
    });
  });

  describe('distance and speed', () => {
    it('records a derived speed and distance between two fixes', async () => {
      await recorder.start();
      provider.pushFix(fixAt(37.7749, -122.4194));
      advance(10000);
      provider.pushFix(fixAt(37.7750, -122.4194));

      const data = recorder.getLiveData();
      expect(data.state).toBe('recording');
      expect(data.movingDistanceMeters).toBeCloseTo(11.1, 1);
      expect(data.currentSpeedKmh).toBeCloseTo(4.0, 1);
      expect(data.speedSource).toBe('derived');
      expect(data.movingDurationMs).toBe(10000);
    });

    it('uses the reported speed when there is one', async () => {
      await recorder.start();
      provider.pushFix(fixAt(LAT, LNG, 10));
      expect(recorder.getLiveData().currentSpeedKmh).toBeCloseTo(36, 5);
      expect(recorder.getLiveData().speedSource).toBe('gps');
    });

    it('does not accumulate distance while manually paused', async () => {
      await startRecording();
      advance(1000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 5));
      const before = recorder.getLiveData().movingDistanceMeters;

      recorder.pause();
      advance(1000);
      provider.pushFix(fixAt(LAT + 20 * STEP, LNG, 5));
      expect(recorder.getLiveData().movingDistanceMeters).toBe(before);
      expect(recorder.getLiveData().pointCount).toBe(2);

      recorder.resume();
      advance(1000);
      provider.pushFix(fixAt(LAT + 21 * STEP, LNG, 5));
      // First fix after resuming opens a new segment
      expect(recorder.getLiveData().movingDistanceMeters).toBe(before);

      advance(1000);
      provider.pushFix(fixAt(LAT + 22 * STEP, LNG, 5));
      expect(recorder.getLiveData().movingDistanceMeters).toBeCloseTo(
        before + haversineDistance(LAT + 21 * STEP, LNG, LAT + 22 * STEP, LNG), 6
      );
      expect(recorder.getLiveData().pointCount).toBe(4);
    });

    it('tracks the maximum speed', async () => {
      await recorder.start();
      provider.pushFix(fixAt(LAT, LNG, 5));
      advance(1000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 8));
      advance(1000);
      provider.pushFix(fixAt(LAT + 2 * STEP, LNG, 6));

      expect(recorder.getSession()?.maxSpeedKmh).toBeCloseTo(28.8, 5);
    });
  });

  describe('fix validation', () => {
    it('drops and counts invalid and out-of-order fixes', async () => {
      await startRecording();
      advance(1000);
      provider.pushFix(fixAt(95));
      provider.pushFix({ ...fixAt(LAT + STEP), timestampMs: T0 - 1 });

      const data = recorder.getLiveData();
      expect(data.rejectedFixCount).toBe(2);
      expect(data.pointCount).toBe(1);
      expect(data.movingDistanceMeters).toBe(0);
    });
  });

  describe('auto-pause', () => {
    /** Two moving fixes, then the rider stops at LAT + STEP */
    async function rideThenStop(): Promise<void> {
      await startRecording();
      advance(1000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 5));
    }

    function pushStationary(): void {
      provider.pushFix(fixAt(LAT + STEP, LNG, 0));
    }

    it('auto-pauses once a stationary run spans the threshold, not before', async () => {
      await rideThenStop();
      advance(1000);
      pushStationary();
      advance(4000);
      pushStationary();
      expect(recorder.getState()).toBe('recording');

      advance(1000);
      pushStationary();
      expect(recorder.getState()).toBe('autoPaused');
      expect(recorder.getSession()?.currentPauseStartMs).toBe(Date.now());
    });

    it('auto-pauses, counts the pause, and resumes on motion', async () => {
      await rideThenStop();
      advance(1000);
      pushStationary();
      advance(2500);
      pushStationary();
      advance(2500);
      pushStationary();
      expect(recorder.getState()).toBe('autoPaused');
      const pointsAtPause = recorder.getLiveData().pointCount;

      const ticks: number[] = [];
      recorder.onPauseTick((ms) => ticks.push(ms));
      advance(5000);
      expect(formatDuration(ticks[ticks.length - 1])).toBe('0:05');
      expect(recorder.getLiveData().currentPauseElapsedMs).toBe(5000);

      // Stationary fixes while paused are not recorded
      pushStationary();
      expect(recorder.getLiveData().pointCount).toBe(pointsAtPause);

      const distanceBefore = recorder.getLiveData().movingDistanceMeters;
      const durationBefore = recorder.getLiveData().movingDurationMs;
      provider.pushFix(fixAt(LAT + 2 * STEP, LNG, 5));

      const session = recorder.getSession();
      expect(recorder.getState()).toBe('recording');
      expect(session?.pausedDurationMs).toBe(5000);
      expect(session?.autoPausedDurationMs).toBe(5000);
      expect(session?.currentPauseStartMs).toBeNull();
      // Distance from the last recorded point counts; the paused time does not
      expect(session?.movingDistanceMeters).toBeCloseTo(
        distanceBefore + haversineDistance(LAT + STEP, LNG, LAT + 2 * STEP, LNG), 6
      );
      expect(session?.movingDurationMs).toBe(durationBefore);
      expect(recorder.getLiveData().pointCount).toBe(pointsAtPause + 1);
    });

    it('counts the distance of the first fix after an auto-pause', async () => {
      settings.autoPauseThreshold = 2;
      await startRecording();
      for (let i = 0; i < 3; i++) {
        advance(1000);
        provider.pushFix(fixAt(LAT, LNG, 0));
      }
      expect(recorder.getState()).toBe('autoPaused');
      const before = recorder.getLiveData().movingDistanceMeters;

      advance(1000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 5));

      expect(recorder.getState()).toBe('recording');
      expect(recorder.getLiveData().movingDistanceMeters - before).toBeCloseTo(11.1, 1);
    });

    it('resets the stationary run on a moving sample', async () => {
      await rideThenStop();
      advance(1000);
      pushStationary();
      advance(3000);
      pushStationary();
      advance(1000);
      provider.pushFix(fixAt(LAT + 2 * STEP, LNG, 5));
      advance(1000);
      provider.pushFix(fixAt(LAT + 2 * STEP, LNG, 0));
      advance(3000);
      provider.pushFix(fixAt(LAT + 2 * STEP, LNG, 0));

      expect(recorder.getState()).toBe('recording');
    });

    it('reads the threshold fresh at each evaluation', async () => {
      await rideThenStop();
      advance(1000);
      pushStationary();
      settings.autoPauseThreshold = 30;
      advance(5000);
      pushStationary();
      expect(recorder.getState()).toBe('recording');

      settings.autoPauseThreshold = 2;
      advance(1000);
      pushStationary();
      expect(recorder.getState()).toBe('autoPaused');
    });

    it('does not leave auto-pause when settings change', async () => {
      await rideThenStop();
      advance(1000);
      pushStationary();
      advance(5000);
      pushStationary();
      expect(recorder.getState()).toBe('autoPaused');

      settings.autoPauseThreshold = 30;
      settings.autoPauseEnabled = false;
      advance(1000);
      pushStationary();
      expect(recorder.getState()).toBe('autoPaused');
    });

    it('falls back to 5 s for an invalid stored threshold', async () => {
      settings.autoPauseThreshold = 7;
      await rideThenStop();
      advance(1000);
      pushStationary();
      advance(5000);
      pushStationary();
      expect(recorder.getState()).toBe('autoPaused');
    });

    it('never auto-pauses when disabled', async () => {
      settings.autoPauseEnabled = false;
      await rideThenStop();
      for (let i = 0; i < 40; i++) {
        advance(1000);
        pushStationary();
      }
      expect(recorder.getState()).toBe('recording');
    });

    it('does not let motion end a manual pause', async () => {
      await startRecording();
      recorder.pause();
      advance(1000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 8));
      expect(recorder.getState()).toBe('manuallyPaused');
    });
  });

  describe('pause accounting', () => {
    it('adds exactly the length of a manual pause', async () => {
      await startRecording();
      recorder.pause();
      advance(12345);
      recorder.resume();

      const session = recorder.getSession();
      expect(session?.pausedDurationMs).toBe(12345);
      expect(session?.manualPausedDurationMs).toBe(12345);
    });

    it('includes the running pause in the snapshot', async () => {
      await startRecording();
      recorder.pause();
      advance(3000);
      recorder.resume();
      recorder.pause();
      advance(2000);

      const data = recorder.getLiveData();
      expect(data.pausedDurationMs).toBe(5000);
      expect(data.currentPauseElapsedMs).toBe(2000);
      expect(recorder.getSession()?.pausedDurationMs).toBe(3000);
    });

    it('cancels the pause counter on resume', async () => {
      await startRecording();
      recorder.pause();
      const ticks: number[] = [];
      recorder.onPauseTick((ms) => ticks.push(ms));
      advance(2000);
      recorder.resume();
      advance(5000);

      expect(ticks).toEqual([0, 1000, 2000]);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('notifies listeners every second while paused', async () => {
      await startRecording();
      const paused: number[] = [];
      recorder.onUpdate((data) => {
        if (data.currentPauseElapsedMs !== null) paused.push(data.currentPauseElapsedMs);
      });
      recorder.pause();
      advance(3000);

      expect(paused).toEqual([0, 0, 1000, 2000, 3000]);
    });
  });

  describe('stop', () => {
    it('saves the ride summary and keeps its fixes', async () => {
      await startRecording();
      advance(10000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 5));
      const rideId = recorder.getSession()?.id;

      const result = recorder.stop();

      expect(recorder.getState()).toBe('idle');
      expect(provider.isWatching).toBe(false);
      provider.pushFix(fixAt(LAT + 2 * STEP, LNG, 5));
      expect(provider.dropped).toBe(1);
      expect(result.kind).toBe('saved');
      if (result.kind !== 'saved') return;
      expect(result.summary.id).toBe(rideId);
      expect(result.summary.pointCount).toBe(2);
      expect(result.summary.movingDurationMs).toBe(10000);
      expect(repo.loadRide(result.summary.id)).toEqual(result.summary);
      expect(repo.loadFixes(result.summary.id)).toHaveLength(2);
    });

    it('flushes a running pause and cancels its counter', async () => {
      await startRecording();
      advance(5000);
      recorder.pause();
      advance(3000);

      const result = recorder.stop();

      expect(result.kind).toBe('saved');
      if (result.kind !== 'saved') return;
      expect(result.summary.pausedDurationMs).toBe(3000);
      expect(result.summary.endedAtMs).toBe(T0 + 8000);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('discards rides shorter than 5 s', async () => {
      await startRecording();
      const rideId = recorder.getSession()?.id ?? '';
      advance(2000);

      expect(recorder.stop()).toEqual({ kind: 'tooShort', durationMs: 2000 });
      expect(repo.loadFixes(rideId)).toEqual([]);
      expect(repo.listRides()).toEqual([]);
    });

    it('cancels a ride that never got a fix', async () => {
      await recorder.start();
      expect(recorder.stop()).toEqual({ kind: 'notStarted' });
      expect(recorder.getState()).toBe('idle');
      expect(repo.listRides()).toEqual([]);
    });

    it('is a no-op when idle', () => {
      expect(recorder.stop()).toEqual({ kind: 'notStarted' });
      expect(console.warn).toHaveBeenCalledWith('Ignoring stopRide while idle');
    });

    it('keeps recording when a fix cannot be saved', async () => {
      vi.spyOn(repo, 'appendFix').mockImplementation(() => {
        throw new Error('disk full');
      });
      await startRecording();
      expect(recorder.getState()).toBe('recording');
      expect(recorder.getLiveData().pointCount).toBe(1);
      expect(console.error).toHaveBeenCalledWith('Error saving fix:', expect.any(Error));
    });

    it('starts a fresh session after stopping', async () => {
      await startRecording();
      advance(6000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 5));
      recorder.stop();

      advance(1000);
      await recorder.start();
      const data = recorder.getLiveData();
      expect(data.movingDistanceMeters).toBe(0);
      expect(data.pointCount).toBe(0);
      expect(data.rideId).toBe(`ride_${T0 + 7000}`);
    });
  });

  describe('GPS signal', () => {
    it('reports silence as unavailable with zero speed, keeping totals', async () => {
      await startRecording();
      advance(1000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 5));
      const distance = recorder.getLiveData().movingDistanceMeters;

      advance(11000);
      const data = recorder.getLiveData();
      expect(data.gpsStatus).toEqual({ kind: 'unavailable' });
      expect(data.currentSpeedKmh).toBe(0);
      expect(data.movingDistanceMeters).toBe(distance);
      expect(data.pointCount).toBe(2);
    });

    it('marks location unavailable on a provider error until the next fix', async () => {
      await startRecording();
      provider.pushError(new LocationUnavailableError());
      expect(recorder.getLiveData().gpsStatus).toEqual({ kind: 'unavailable' });

      advance(1000);
      provider.pushFix(fixAt(LAT + STEP, LNG, 5));
      expect(recorder.getLiveData().gpsStatus).toEqual({ kind: 'active', accuracyMeters: 5 });
    });

    it('logs other provider errors and reports GPS unavailable', async () => {
      await startRecording();
      const error = new Error('provider crashed');
      provider.pushError(error);

      expect(console.error).toHaveBeenCalledWith('GPS error:', error);
      expect(recorder.getLiveData().gpsStatus).toEqual({ kind: 'unavailable' });
      expect(recorder.getState()).toBe('recording');
    });
  });

  describe('heading and route', () => {
    it('exposes the bearing and drops it when stale', async () => {
      await recorder.start();
      provider.pushFix(fixAt(LAT, LNG, 5, 5, 90));
      expect(recorder.getLiveData().bearing.degrees).toBe(90);

      advance(46000);
      expect(recorder.getLiveData().bearing.degrees).toBeNull();
    });

    it('exposes a simplified route and bounds', async () => {
      await recorder.start();
      for (let i = 0; i < 20; i++) {
        provider.pushFix(fixAt(LAT + i * STEP, LNG, 5));
        advance(1000);
      }

      const data = recorder.getLiveData();
      expect(data.simplifiedRoute.toleranceMeters).toBe(10);
      expect(data.simplifiedRoute.points).toEqual([[LAT, LNG], [LAT + 19 * STEP, LNG]]);
      expect(data.bounds).toEqual({ southWest: [LAT, LNG], northEast: [LAT + 19 * STEP, LNG] });
    });

    it('keeps the heading steady through stationary jitter', async () => {
      await recorder.start();
      provider.pushFix(fixAt(LAT, LNG, 5, 5, 90));
      advance(1000);
      // ~0.1 m north in 1 s: stationary, would derive a bearing of 0
      provider.pushFix(fixAt(LAT + 0.000001, LNG, 0));

      expect(recorder.getLiveData().currentSpeedKmh).toBe(0);
      expect(recorder.getLiveData().bearing.degrees).toBe(90);
    });

    it('gives each snapshot its own copy of the route', async () => {
      await recorder.start();
      for (let i = 0; i < 5; i++) {
        provider.pushFix(fixAt(LAT + i * 0.001, LNG, 5));
        advance(1000);
      }

      const snapshot = recorder.getLiveData();
      snapshot.simplifiedRoute.points.push([0, 0]);
      if (snapshot.bounds) snapshot.bounds.northEast[0] = 0;

      const fresh = recorder.getLiveData();
      expect(fresh.simplifiedRoute.points).toHaveLength(2);
      expect(fresh.bounds?.northEast).toEqual([LAT + 4 * 0.001, LNG]);
    });

    it('has no route before the first fix', async () => {
      await recorder.start();
      const data = recorder.getLiveData();
      expect(data.simplifiedRoute.points).toEqual([]);
      expect(data.bounds).toBeNull();
    });
  });

  describe('listeners', () => {
    it('calls onUpdate listeners on state changes', async () => {
      const states: RideState[] = [];
      recorder.onUpdate((data) => states.push(data.state));

      await recorder.start();
      provider.pushFix(fixAt(LAT, LNG, 5));
      recorder.pause();
      recorder.resume();
      recorder.stop();

      expect(states).toContain('waitingForFix');
      expect(states).toContain('recording');
      expect(states).toContain('manuallyPaused');
      expect(states[states.length - 1]).toBe('idle');
    });

    it('can remove listeners', async () => {
      const calls: number[] = [];
      const cb = () => calls.push(1);
      recorder.onUpdate(cb);

      await recorder.start();
      const countBefore = calls.length;
      expect(countBefore).toBeGreaterThan(0);

      recorder.offUpdate(cb);
      provider.pushFix(fixAt(LAT));
      expect(calls.length).toBe(countBefore);
    });
  });
});
