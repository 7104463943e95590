import type { GeoPoint, RouteCorridor } from '../core/types.js';

const EARTH_RADIUS_KM = 6371;

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** Ray casting in lon/lat space. Points on an edge count as inside. */
export function pointInPolygon(p: GeoPoint, vertices: readonly GeoPoint[]): boolean {
  if (vertices.length < 3) return false;
  let inside = false;
  for (let i = 0, j = vertices.length - 1; i < vertices.length; j = i++) {
    const a = vertices[i];
    const b = vertices[j];
    if (onSegment(p, a, b)) return true;
    const crosses =
      a.lat > p.lat !== b.lat > p.lat &&
      p.lon < ((b.lon - a.lon) * (p.lat - a.lat)) / (b.lat - a.lat) + a.lon;
    if (crosses) inside = !inside;
  }
  return inside;
}

function onSegment(p: GeoPoint, a: GeoPoint, b: GeoPoint): boolean {
  const cross = (b.lon - a.lon) * (p.lat - a.lat) - (b.lat - a.lat) * (p.lon - a.lon);
  if (Math.abs(cross) > 1e-12) return false;
  return (
    p.lon >= Math.min(a.lon, b.lon) &&
    p.lon <= Math.max(a.lon, b.lon) &&
    p.lat >= Math.min(a.lat, b.lat) &&
    p.lat <= Math.max(a.lat, b.lat)
  );
}

// Local equirectangular projection around p; adequate for corridor widths of a few hundred km
export function distanceToSegmentKm(p: GeoPoint, a: GeoPoint, b: GeoPoint): number {
  const kx = Math.cos(toRad(p.lat)) * (Math.PI / 180) * EARTH_RADIUS_KM;
  const ky = (Math.PI / 180) * EARTH_RADIUS_KM;
  const ax = (a.lon - p.lon) * kx;
  const ay = (a.lat - p.lat) * ky;
  const bx = (b.lon - p.lon) * kx;
  const by = (b.lat - p.lat) * ky;
  const dx = bx - ax;
  const dy = by - ay;
  const len2 = dx * dx + dy * dy;
  const t = len2 === 0 ? 0 : Math.max(0, Math.min(1, -(ax * dx + ay * dy) / len2));
  const cx = ax + t * dx;
  const cy = ay + t * dy;
  return Math.sqrt(cx * cx + cy * cy);
}

export function distanceToPolylineKm(p: GeoPoint, waypoints: readonly GeoPoint[]): number {
  if (waypoints.length === 0) return Number.POSITIVE_INFINITY;
  if (waypoints.length === 1) return haversineKm(p, waypoints[0]);
  let best = Number.POSITIVE_INFINITY;
  for (let i = 1; i < waypoints.length; i++) {
    best = Math.min(best, distanceToSegmentKm(p, waypoints[i - 1], waypoints[i]));
  }
  return best;
}

/**
 * How far outside the corridor the point lies, in km. Zero when inside.
 * For polygons the distance is measured to the nearest edge.
 */
export function distanceOutsideCorridorKm(p: GeoPoint, corridor: RouteCorridor): number {
  switch (corridor.kind) {
    case 'polygon': {
      if (pointInPolygon(p, corridor.vertices)) return 0;
      const ring = [...corridor.vertices, corridor.vertices[0]];
      return distanceToPolylineKm(p, ring);
    }
    case 'corridor': {
      const d = distanceToPolylineKm(p, corridor.waypoints);
      return d > corridor.halfWidthKm ? d - corridor.halfWidthKm : 0;
    }
  }
}
