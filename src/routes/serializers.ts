import { toIsoString } from "../lib/time.js";
import type { TransitionResult, VehicleStatus } from "../types.js";

export function transitionBody(result: TransitionResult) {
  return {
    vehicle_id: result.vehicleId,
    entered: result.entered,
    exited: result.exited,
    at: toIsoString(result.at),
    position: result.position,
    duplicate: result.duplicate,
    debounced: result.debounced,
  };
}

export function statusBody(status: VehicleStatus) {
  return {
    vehicle_id: status.vehicleId,
    current_zones: status.currentZones,
    last_event_ts: toIsoString(status.lastEventTs),
    last_position: status.lastPosition,
    speed_kmh: status.lastSpeedKmh,
    heading_deg: status.lastHeadingDeg,
  };
}
