import type { VehicleState, VehicleStateInput } from "../types.js";

/**
 * Key-value contract for per-vehicle state. Implementations must make
 * `compareAndSet` atomic per vehicle: either the whole new state is visible or none of it.
 */
export interface VehicleStateStore {
  /** Latest committed state, or the empty state (version 0) for an unseen vehicle. */
  get(vehicleId: string): Promise<VehicleState>;
  /** Latest committed state, or null for an unseen vehicle. */
  find(vehicleId: string): Promise<VehicleState | null>;
  /** Commits `next` iff the stored version equals `expectedVersion`. */
  compareAndSet(vehicleId: string, expectedVersion: number, next: VehicleStateInput): Promise<boolean>;
  count(): Promise<number>;
}

export function emptyVehicleState(vehicleId: string): VehicleState {
  return {
    vehicleId,
    currentZones: [],
    lastEventTs: null,
    lastEventId: null,
    lastPosition: null,
    lastSpeedKmh: null,
    lastHeadingDeg: null,
    lastProcessedAt: null,
    version: 0,
  };
}

function snapshot(state: VehicleState): VehicleState {
  return {
    ...state,
    currentZones: [...state.currentZones],
    lastPosition: state.lastPosition ? { ...state.lastPosition } : null,
  };
}

export class InMemoryVehicleStateStore implements VehicleStateStore {
  private readonly vehicles = new Map<string, VehicleState>();

  async get(vehicleId: string): Promise<VehicleState> {
    const state = this.vehicles.get(vehicleId);
    return state ? snapshot(state) : emptyVehicleState(vehicleId);
  }

  async find(vehicleId: string): Promise<VehicleState | null> {
    const state = this.vehicles.get(vehicleId);
    return state ? snapshot(state) : null;
  }

  async compareAndSet(vehicleId: string, expectedVersion: number, next: VehicleStateInput): Promise<boolean> {
    const currentVersion = this.vehicles.get(vehicleId)?.version ?? 0;
    if (currentVersion !== expectedVersion) return false;
    const committed = snapshot({ ...next, vehicleId, version: expectedVersion + 1 });
    this.vehicles.set(vehicleId, committed);
    return true;
  }

  async count(): Promise<number> {
    return this.vehicles.size;
  }
}
