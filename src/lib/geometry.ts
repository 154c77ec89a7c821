import type { CircleZone, LatLon, PolygonZone, Zone } from "../types.js";

export const METERS_PER_DEGREE_LAT = 111_132;
export const METERS_PER_DEGREE_LON_AT_EQUATOR = 111_320;

// Absorbs floating-point noise so that points exactly on a boundary stay inside.
const BOUNDARY_TOLERANCE_M = 1e-6;

type PlanarPoint = {
  x: number;
  y: number;
};

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function isValidPosition(position: LatLon | null | undefined): position is LatLon {
  return !!position
    && Number.isFinite(position.lat)
    && Number.isFinite(position.lon)
    && position.lat >= -90
    && position.lat <= 90
    && position.lon >= -180
    && position.lon <= 180;
}

/**
 * Equirectangular projection of `position` into metres relative to `origin`,
 * scaling longitude by the cosine of `referenceLat`. Valid for spans of a few kilometres.
 */
function project(position: LatLon, origin: LatLon, referenceLat: number): PlanarPoint {
  return {
    x: (position.lon - origin.lon) * METERS_PER_DEGREE_LON_AT_EQUATOR * Math.cos(toRadians(referenceLat)),
    y: (position.lat - origin.lat) * METERS_PER_DEGREE_LAT,
  };
}

export function distanceMeters(from: LatLon, to: LatLon): number {
  const { x, y } = project(to, from, from.lat);
  return Math.sqrt(x * x + y * y);
}

function samePosition(a: LatLon, b: LatLon): boolean {
  return a.lat === b.lat && a.lon === b.lon;
}

/** Ring without consecutive duplicates or an explicit closing vertex. */
export function normalizeRing(points: readonly LatLon[]): LatLon[] {
  const ring: LatLon[] = [];
  for (const point of points) {
    const previous = ring[ring.length - 1];
    if (previous && samePosition(previous, point)) continue;
    ring.push(point);
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (ring.length > 1 && first && last && samePosition(first, last)) {
    ring.pop();
  }
  return ring;
}

export function countDistinctVertices(points: readonly LatLon[]): number {
  const keys = new Set(points.map((point) => `${point.lat},${point.lon}`));
  return keys.size;
}

export function isDegeneratePolygon(points: readonly LatLon[]): boolean {
  if (!points.every((point) => isValidPosition(point))) return true;
  return countDistinctVertices(points) < 3;
}

function distanceToSegment(a: PlanarPoint, b: PlanarPoint): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSquared = dx * dx + dy * dy;
  if (lengthSquared === 0) return Math.sqrt(a.x * a.x + a.y * a.y);
  // Projection of the origin onto the segment, clamped to its ends.
  const t = Math.max(0, Math.min(1, -(a.x * dx + a.y * dy) / lengthSquared));
  const px = a.x + t * dx;
  const py = a.y + t * dy;
  return Math.sqrt(px * px + py * py);
}

function circleContains(zone: CircleZone, position: LatLon): boolean {
  if (!isValidPosition(zone.center)) return false;
  if (!Number.isFinite(zone.radius_m) || zone.radius_m <= 0) return false;
  return distanceMeters(zone.center, position) <= zone.radius_m + BOUNDARY_TOLERANCE_M;
}

function polygonContains(zone: PolygonZone, position: LatLon): boolean {
  const points = Array.isArray(zone.points) ? zone.points : [];
  if (isDegeneratePolygon(points)) return false;

  // The tested position is the origin of the projected ring.
  const ring = normalizeRing(points).map((point) => project(point, position, position.lat));

  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const current = ring[i];
    const previous = ring[j];
    if (!current || !previous) continue;
    if (distanceToSegment(previous, current) <= BOUNDARY_TOLERANCE_M) {
      return true;
    }
    const crosses = (current.y > 0) !== (previous.y > 0)
      && 0 < ((previous.x - current.x) * (0 - current.y)) / (previous.y - current.y) + current.x;
    if (crosses) inside = !inside;
  }
  return inside;
}

/**
 * Containment test for a single zone. Boundaries count as inside; malformed zones
 * never contain anything.
 */
export function contains(zone: Zone, position: LatLon): boolean {
  if (!isValidPosition(position)) return false;
  switch (zone.type) {
    case "circle":
      return circleContains(zone, position);
    case "polygon":
      return polygonContains(zone, position);
    default:
      return false;
  }
}

export function zonesForPoint(zones: readonly Zone[], position: LatLon): string[] {
  return zones.filter((zone) => contains(zone, position)).map((zone) => zone.id);
}
