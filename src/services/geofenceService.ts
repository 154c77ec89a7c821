import type { BaseLogger } from "pino";
import type { ServiceConfig } from "../config.js";
import type { KeyedMutex } from "../lib/keyedMutex.js";
import type { LocationEvent, TransitionResult, VehicleStatus, Zone } from "../types.js";
import {
  TransitionEngine,
  type ProcessOptions,
  type TransitionEngineSettings,
} from "./transitionEngine.js";
import { InMemoryVehicleStateStore, type VehicleStateStore } from "./vehicleStateStore.js";
import type { ZoneRegistry } from "./zoneRegistry.js";

export type GeofenceServiceDependencies = {
  registry: ZoneRegistry;
  settings: TransitionEngineSettings;
  logger: BaseLogger;
  store?: VehicleStateStore;
  now?: () => number;
  lock?: KeyedMutex;
};

export type GeofenceHealth = {
  zones: number;
  vehicles: number;
};

export function engineSettingsFromConfig(
  config: Pick<ServiceConfig, "EVENT_DEBOUNCE_SECONDS" | "MAX_FUTURE_SKEW_SECONDS">
): TransitionEngineSettings {
  return {
    debounceMs: config.EVENT_DEBOUNCE_SECONDS * 1000,
    maxFutureSkewMs: config.MAX_FUTURE_SKEW_SECONDS * 1000,
  };
}

/** Core-facing boundary: ingest, status query and zone listing. */
export class GeofenceService {
  private readonly registry: ZoneRegistry;
  private readonly store: VehicleStateStore;
  private readonly engine: TransitionEngine;

  constructor(deps: GeofenceServiceDependencies) {
    this.registry = deps.registry;
    this.store = deps.store ?? new InMemoryVehicleStateStore();
    this.engine = new TransitionEngine({
      registry: deps.registry,
      store: this.store,
      settings: deps.settings,
      logger: deps.logger,
      now: deps.now,
      lock: deps.lock,
    });
  }

  processEvent(event: LocationEvent, options?: ProcessOptions): Promise<TransitionResult> {
    return this.engine.process(event, options);
  }

  // Reads the last committed snapshot; never waits on an in-flight event.
  async getStatus(vehicleId: string): Promise<VehicleStatus | null> {
    const state = await this.store.find(vehicleId);
    if (!state) return null;
    return {
      vehicleId: state.vehicleId,
      currentZones: [...state.currentZones].sort(),
      lastEventTs: state.lastEventTs === null ? null : new Date(state.lastEventTs),
      lastPosition: state.lastPosition,
      lastSpeedKmh: state.lastSpeedKmh,
      lastHeadingDeg: state.lastHeadingDeg,
    };
  }

  listZones(): readonly Zone[] {
    return this.registry.all();
  }

  getZone(zoneId: string): Zone | null {
    return this.registry.byId(zoneId);
  }

  async health(): Promise<GeofenceHealth> {
    return { zones: this.registry.size, vehicles: await this.store.count() };
  }
}

export function createGeofenceService(deps: GeofenceServiceDependencies): GeofenceService {
  return new GeofenceService(deps);
}
