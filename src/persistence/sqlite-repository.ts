import type { LocationFix, RideSummary } from '@/types';
import type { RideDatabase } from './db';
import type { RideRepository } from './repository';

interface RideRow {
  id: string;
  name: string;
  started_at_ms: number;
  ended_at_ms: number;
  moving_distance_m: number;
  moving_duration_ms: number;
  paused_duration_ms: number;
  manual_paused_duration_ms: number;
  auto_paused_duration_ms: number;
  max_speed_kmh: number;
  avg_speed_kmh: number;
  point_count: number;
}

interface FixRow {
  ride_id: string;
  latitude: number;
  longitude: number;
  accuracy_m: number;
  timestamp_ms: number;
  reported_speed_mps: number | null;
  reported_bearing_deg: number | null;
}

/**
 * RideRepository on SQLite. Statements are prepared once; better-sqlite3 is
 * synchronous, so appending a fix completes before the next one is processed.
 */
export class SqliteRideRepository implements RideRepository {
  private readonly insertFix;
  private readonly selectFixes;
  private readonly upsertRide;
  private readonly selectRide;
  private readonly selectRides;
  private readonly deleteRideRow;
  private readonly deleteFixRows;

  constructor(private readonly db: RideDatabase) {
    this.insertFix = db.prepare<FixRow>(`
      INSERT INTO fixes (
        ride_id, seq, latitude, longitude, accuracy_m, timestamp_ms,
        reported_speed_mps, reported_bearing_deg
      )
      VALUES (
        @ride_id,
        (SELECT COALESCE(MAX(seq), -1) + 1 FROM fixes WHERE ride_id = @ride_id),
        @latitude, @longitude, @accuracy_m, @timestamp_ms,
        @reported_speed_mps, @reported_bearing_deg
      )
    `);
    this.selectFixes = db.prepare<[string], FixRow>(
      'SELECT * FROM fixes WHERE ride_id = ? ORDER BY seq'
    );
    this.upsertRide = db.prepare<RideRow>(`
      INSERT INTO rides (
        id, name, started_at_ms, ended_at_ms, moving_distance_m, moving_duration_ms,
        paused_duration_ms, manual_paused_duration_ms, auto_paused_duration_ms,
        max_speed_kmh, avg_speed_kmh, point_count
      )
      VALUES (
        @id, @name, @started_at_ms, @ended_at_ms, @moving_distance_m, @moving_duration_ms,
        @paused_duration_ms, @manual_paused_duration_ms, @auto_paused_duration_ms,
        @max_speed_kmh, @avg_speed_kmh, @point_count
      )
      ON CONFLICT(id) DO UPDATE SET
        name                      = excluded.name,
        started_at_ms             = excluded.started_at_ms,
        ended_at_ms               = excluded.ended_at_ms,
        moving_distance_m         = excluded.moving_distance_m,
        moving_duration_ms        = excluded.moving_duration_ms,
        paused_duration_ms        = excluded.paused_duration_ms,
        manual_paused_duration_ms = excluded.manual_paused_duration_ms,
        auto_paused_duration_ms   = excluded.auto_paused_duration_ms,
        max_speed_kmh             = excluded.max_speed_kmh,
        avg_speed_kmh             = excluded.avg_speed_kmh,
        point_count               = excluded.point_count
    `);
    this.selectRide = db.prepare<[string], RideRow>('SELECT * FROM rides WHERE id = ?');
    this.selectRides = db.prepare<[], RideRow>('SELECT * FROM rides ORDER BY started_at_ms DESC');
    this.deleteRideRow = db.prepare<[string]>('DELETE FROM rides WHERE id = ?');
    this.deleteFixRows = db.prepare<[string]>('DELETE FROM fixes WHERE ride_id = ?');
  }

  appendFix(rideId: string, fix: LocationFix): void {
    this.insertFix.run({
      ride_id: rideId,
      latitude: fix.latitude,
      longitude: fix.longitude,
      accuracy_m: fix.accuracyMeters,
      timestamp_ms: fix.timestampMs,
      reported_speed_mps: fix.reportedSpeedMps,
      reported_bearing_deg: fix.reportedBearingDeg,
    });
  }

  loadFixes(rideId: string): LocationFix[] {
    return this.selectFixes.all(rideId).map(row => ({
      latitude: row.latitude,
      longitude: row.longitude,
      accuracyMeters: row.accuracy_m,
      timestampMs: row.timestamp_ms,
      reportedSpeedMps: row.reported_speed_mps,
      reportedBearingDeg: row.reported_bearing_deg,
    }));
  }

  saveRide(summary: RideSummary): void {
    this.upsertRide.run(toRow(summary));
  }

  loadRide(id: string): RideSummary | null {
    const row = this.selectRide.get(id);
    return row ? fromRow(row) : null;
  }

  listRides(): RideSummary[] {
    return this.selectRides.all().map(fromRow);
  }

  deleteRide(id: string): void {
    this.db.transaction((rideId: string) => {
      this.deleteFixRows.run(rideId);
      this.deleteRideRow.run(rideId);
    })(id);
  }
}

function toRow(s: RideSummary): RideRow {
  return {
    id: s.id,
    name: s.name,
    started_at_ms: s.startedAtMs,
    ended_at_ms: s.endedAtMs,
    moving_distance_m: s.movingDistanceMeters,
    moving_duration_ms: s.movingDurationMs,
    paused_duration_ms: s.pausedDurationMs,
    manual_paused_duration_ms: s.manualPausedDurationMs,
    auto_paused_duration_ms: s.autoPausedDurationMs,
    max_speed_kmh: s.maxSpeedKmh,
    avg_speed_kmh: s.avgSpeedKmh,
    point_count: s.pointCount,
  };
}

function fromRow(r: RideRow): RideSummary {
  return {
    id: r.id,
    name: r.name,
    startedAtMs: r.started_at_ms,
    endedAtMs: r.ended_at_ms,
    movingDistanceMeters: r.moving_distance_m,
    movingDurationMs: r.moving_duration_ms,
    pausedDurationMs: r.paused_duration_ms,
    manualPausedDurationMs: r.manual_paused_duration_ms,
    autoPausedDurationMs: r.auto_paused_duration_ms,
    maxSpeedKmh: r.max_speed_kmh,
    avgSpeedKmh: r.avg_speed_kmh,
    pointCount: r.point_count,
  };
}
