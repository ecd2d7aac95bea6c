import type { LocationFix, RideSummary } from '@/types';

/**
 * Storage contract for recorded rides. Fixes are appended while the ride is
 * in progress; the summary is written once when it stops.
 */
export interface RideRepository {
  appendFix(rideId: string, fix: LocationFix): void;
  loadFixes(rideId: string): LocationFix[];
  saveRide(summary: RideSummary): void;
  loadRide(id: string): RideSummary | null;
  /** Newest first */
  listRides(): RideSummary[];
  /** Removes the ride and its fixes */
  deleteRide(id: string): void;
}

/** Repository kept in memory, for tests and replays that should not touch disk */
export class InMemoryRideRepository implements RideRepository {
  private readonly fixes = new Map<string, LocationFix[]>();
  private readonly rides = new Map<string, RideSummary>();

  appendFix(rideId: string, fix: LocationFix): void {
    const list = this.fixes.get(rideId);
    if (list) {
      list.push(fix);
    } else {
      this.fixes.set(rideId, [fix]);
    }
  }

  loadFixes(rideId: string): LocationFix[] {
    return [...(this.fixes.get(rideId) ?? [])];
  }

  saveRide(summary: RideSummary): void {
    this.rides.set(summary.id, { ...summary });
  }

  loadRide(id: string): RideSummary | null {
    const ride = this.rides.get(id);
    return ride ? { ...ride } : null;
  }

  listRides(): RideSummary[] {
    return [...this.rides.values()]
      .sort((a, b) => b.startedAtMs - a.startedAtMs)
      .map(r => ({ ...r }));
  }

  deleteRide(id: string): void {
    this.rides.delete(id);
    this.fixes.delete(id);
  }
}
