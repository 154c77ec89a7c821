import { isDegeneratePolygon, isValidPosition } from "../lib/geometry.js";
import type { Zone } from "../types.js";

export type ZoneConfigErrorReason =
  | "INVALID_ZONE_FILE"
  | "DUPLICATE_ZONE_ID"
  | "DEGENERATE_POLYGON"
  | "INVALID_CIRCLE";

export class ZoneConfigError extends Error {
  readonly reason: ZoneConfigErrorReason;
  readonly zoneId: string | null;

  constructor(reason: ZoneConfigErrorReason, message: string, zoneId: string | null = null) {
    super(message);
    this.reason = reason;
    this.zoneId = zoneId;
    Object.setPrototypeOf(this, ZoneConfigError.prototype);
  }
}

function freezeZone(zone: Zone): Zone {
  if (zone.type === "circle") {
    const center = { lat: zone.center.lat, lon: zone.center.lon };
    Object.freeze(center);
    return Object.freeze({ ...zone, center });
  }
  const points = zone.points.map((point) => Object.freeze({ lat: point.lat, lon: point.lon }));
  Object.freeze(points);
  return Object.freeze({ ...zone, points });
}

function assertZoneGeometry(zone: Zone) {
  if (zone.type === "circle") {
    if (!isValidPosition(zone.center) || !Number.isFinite(zone.radius_m) || zone.radius_m <= 0) {
      throw new ZoneConfigError("INVALID_CIRCLE", `zone ${zone.id} has an invalid center or radius`, zone.id);
    }
    return;
  }
  if (isDegeneratePolygon(zone.points)) {
    throw new ZoneConfigError("DEGENERATE_POLYGON", `zone ${zone.id} needs at least 3 distinct valid points`, zone.id);
  }
}

/** Immutable, load-ordered set of zones. Replace the whole registry to reload. */
export class ZoneRegistry {
  private readonly zones: readonly Zone[];
  private readonly index: ReadonlyMap<string, Zone>;

  constructor(zones: readonly Zone[]) {
    const index = new Map<string, Zone>();
    const ordered: Zone[] = [];
    for (const zone of zones) {
      if (index.has(zone.id)) {
        throw new ZoneConfigError("DUPLICATE_ZONE_ID", `duplicate zone id: ${zone.id}`, zone.id);
      }
      assertZoneGeometry(zone);
      const frozen = freezeZone(zone);
      index.set(zone.id, frozen);
      ordered.push(frozen);
    }
    this.zones = Object.freeze(ordered);
    this.index = index;
  }

  all(): readonly Zone[] {
    return this.zones;
  }

  byId(id: string): Zone | null {
    return this.index.get(id) ?? null;
  }

  get size(): number {
    return this.zones.length;
  }
}
