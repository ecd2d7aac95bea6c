import simplify from 'simplify-js';
import type { LatLng, MapBounds, RouteSimplificationResult } from '@/types';
import { DEFAULT_ROUTE_TOLERANCE_METERS, METERS_PER_DEGREE } from '@/constants/ride';

/**
 * Douglas–Peucker simplification of a route for map display.
 *
 * Tolerance is given in meters and converted to degrees with a flat
 * 111 km/degree approximation, which is close enough at cycling scale.
 * Routes of two points or fewer come back unchanged (as a copy).
 * Endpoints are always kept.
 */
export function simplifyRoute(
  points: readonly LatLng[],
  toleranceMeters: number = DEFAULT_ROUTE_TOLERANCE_METERS
): LatLng[] {
  if (points.length <= 2) return points.map(([lat, lng]): LatLng => [lat, lng]);

  const toleranceDeg = toleranceMeters / METERS_PER_DEGREE;
  const xy = points.map(([lat, lng]) => ({ x: lng, y: lat }));
  // highQuality = true: skip the radial pre-pass, Douglas–Peucker only
  return simplify(xy, toleranceDeg, true).map((p): LatLng => [p.y, p.x]);
}

/**
 * Smallest box containing every point. Null for fewer than two points;
 * a single point should be shown at a fixed zoom instead.
 */
export function routeBounds(points: readonly LatLng[]): MapBounds | null {
  if (points.length < 2) return null;

  let minLat = Infinity;
  let minLng = Infinity;
  let maxLat = -Infinity;
  let maxLng = -Infinity;
  for (const [lat, lng] of points) {
    if (lat < minLat) minLat = lat;
    if (lat > maxLat) maxLat = lat;
    if (lng < minLng) minLng = lng;
    if (lng > maxLng) maxLng = lng;
  }

  return { southWest: [minLat, minLng], northEast: [maxLat, maxLng] };
}

/**
 * Memoizes route geometry for a ride whose point list only grows.
 * The point count identifies the list, so call reset() between rides.
 * Callers get copies; the cached geometry is never handed out.
 */
export class RouteGeometryCache {
  private simplified: { key: string; result: RouteSimplificationResult } | null = null;
  private bounds: { count: number; result: MapBounds | null } | null = null;

  simplify(points: readonly LatLng[], toleranceMeters: number): RouteSimplificationResult {
    const key = `${points.length}:${toleranceMeters}`;
    const cached = this.simplified;
    if (cached && cached.key === key) return copySimplification(cached.result);

    const result = { points: simplifyRoute(points, toleranceMeters), toleranceMeters };
    this.simplified = { key, result };
    return copySimplification(result);
  }

  boundsOf(points: readonly LatLng[]): MapBounds | null {
    const cached = this.bounds;
    if (cached && cached.count === points.length) return copyBounds(cached.result);

    const result = routeBounds(points);
    this.bounds = { count: points.length, result };
    return copyBounds(result);
  }

  reset(): void {
    this.simplified = null;
    this.bounds = null;
  }
}

function copyPoint([lat, lng]: LatLng): LatLng {
  return [lat, lng];
}

function copySimplification(result: RouteSimplificationResult): RouteSimplificationResult {
  return { points: result.points.map(copyPoint), toleranceMeters: result.toleranceMeters };
}

function copyBounds(bounds: MapBounds | null): MapBounds | null {
  if (!bounds) return null;
  return { southWest: copyPoint(bounds.southWest), northEast: copyPoint(bounds.northEast) };
}
