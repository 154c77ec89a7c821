import type { BaseLogger } from "pino";
import { contains as defaultContains, isValidPosition } from "../lib/geometry.js";
import { KeyedMutex } from "../lib/keyedMutex.js";
import type {
  LatLon,
  LocationEvent,
  TransitionResult,
  VehicleState,
  VehicleStateInput,
  Zone,
} from "../types.js";
import type { VehicleStateStore } from "./vehicleStateStore.js";
import type { ZoneRegistry } from "./zoneRegistry.js";

export type TransitionErrorReason =
  | "INVALID_VEHICLE_ID"
  | "INVALID_POSITION"
  | "INVALID_TIMESTAMP"
  | "FUTURE_TIMESTAMP"
  | "INVALID_SPEED"
  | "INVALID_HEADING"
  | "STATE_CONFLICT";

export class TransitionError extends Error {
  readonly statusCode: number;
  readonly reason: TransitionErrorReason;

  constructor(reason: TransitionErrorReason, message: string, statusCode = 400) {
    super(message);
    this.reason = reason;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, TransitionError.prototype);
  }
}

export type TransitionEngineSettings = {
  debounceMs: number;
  maxFutureSkewMs: number;
};

export type TransitionEngineDependencies = {
  registry: ZoneRegistry;
  store: VehicleStateStore;
  settings: TransitionEngineSettings;
  logger: BaseLogger;
  now?: () => number;
  lock?: KeyedMutex;
  contains?: (zone: Zone, position: LatLon) => boolean;
};

export type ProcessOptions = {
  /** Honoured up to the commit; an aborted event leaves the stored state untouched. */
  signal?: AbortSignal;
};

type ValidatedEvent = {
  vehicleId: string;
  position: LatLon;
  timestampMs: number;
  eventId: string | null;
  speedKmh: number | null;
  headingDeg: number | null;
};

function difference(from: readonly string[], remove: readonly string[]): string[] {
  const excluded = new Set(remove);
  return from.filter((id) => !excluded.has(id)).sort();
}

function optionalNumber(value: number | null | undefined): number | null {
  return value === undefined || value === null ? null : value;
}

export class TransitionEngine {
  private readonly registry: ZoneRegistry;
  private readonly store: VehicleStateStore;
  private readonly settings: TransitionEngineSettings;
  private readonly logger: BaseLogger;
  private readonly now: () => number;
  private readonly lock: KeyedMutex;
  private readonly contains: (zone: Zone, position: LatLon) => boolean;

  constructor(deps: TransitionEngineDependencies) {
    this.registry = deps.registry;
    this.store = deps.store;
    this.settings = deps.settings;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.lock = deps.lock ?? new KeyedMutex();
    this.contains = deps.contains ?? defaultContains;
  }

  async process(event: LocationEvent, options?: ProcessOptions): Promise<TransitionResult> {
    const validated = this.validate(event);
    options?.signal?.throwIfAborted();
    return this.lock.runExclusive(validated.vehicleId, () => this.apply(validated, options?.signal));
  }

  private validate(event: LocationEvent): ValidatedEvent {
    const vehicleId = typeof event.vehicleId === "string" ? event.vehicleId.trim() : "";
    if (!vehicleId) {
      throw new TransitionError("INVALID_VEHICLE_ID", "vehicle id is required");
    }
    if (!isValidPosition(event.position)) {
      throw new TransitionError("INVALID_POSITION", "position must have lat in [-90, 90] and lon in [-180, 180]");
    }
    const timestampMs = event.timestamp instanceof Date ? event.timestamp.getTime() : Number.NaN;
    if (!Number.isFinite(timestampMs)) {
      throw new TransitionError("INVALID_TIMESTAMP", "timestamp is invalid");
    }
    if (timestampMs > this.now() + this.settings.maxFutureSkewMs) {
      throw new TransitionError("FUTURE_TIMESTAMP", "Timestamp cannot be in the future.");
    }
    const speedKmh = optionalNumber(event.speedKmh);
    if (speedKmh !== null && (!Number.isFinite(speedKmh) || speedKmh < 0)) {
      throw new TransitionError("INVALID_SPEED", "speed must be a non-negative number");
    }
    const headingDeg = optionalNumber(event.headingDeg);
    if (headingDeg !== null && (!Number.isFinite(headingDeg) || headingDeg < 0 || headingDeg > 360)) {
      throw new TransitionError("INVALID_HEADING", "heading must be within [0, 360]");
    }
    const eventId = typeof event.eventId === "string" && event.eventId.trim() ? event.eventId.trim() : null;

    return {
      vehicleId,
      position: { lat: event.position.lat, lon: event.position.lon },
      timestampMs,
      eventId,
      speedKmh,
      headingDeg,
    };
  }

  private evaluate(vehicleId: string, position: LatLon): string[] {
    const inside: string[] = [];
    for (const zone of this.registry.all()) {
      try {
        if (this.contains(zone, position)) inside.push(zone.id);
      }
      catch (err) {
        this.logger.warn({ err, vehicleId, zoneId: zone.id }, "zone evaluation failed; treating as outside");
      }
    }
    return inside;
  }

  private async apply(event: ValidatedEvent, signal?: AbortSignal): Promise<TransitionResult> {
    const { vehicleId, position, timestampMs, eventId } = event;
    const previous = await this.store.get(vehicleId);
    const at = new Date(timestampMs);

    if (eventId !== null && eventId === previous.lastEventId) {
      this.logger.debug({ vehicleId, eventId }, "duplicate event ignored");
      return { vehicleId, entered: [], exited: [], at, position, duplicate: true, debounced: false };
    }

    const now = this.now();
    const debounced = previous.lastProcessedAt !== null
      && now - previous.lastProcessedAt < this.settings.debounceMs;
    const currentZones = debounced ? previous.currentZones : this.evaluate(vehicleId, position);
    const entered = debounced ? [] : difference(currentZones, previous.currentZones);
    const exited = debounced ? [] : difference(previous.currentZones, currentZones);

    const next = this.nextState(previous, event, currentZones, now);
    signal?.throwIfAborted();
    const committed = await this.store.compareAndSet(vehicleId, previous.version, next);
    if (!committed) {
      throw new TransitionError("STATE_CONFLICT", `state for vehicle ${vehicleId} changed during processing`, 409);
    }

    if (debounced) {
      this.logger.debug({ vehicleId, debounceMs: this.settings.debounceMs }, "event debounced; zones not re-evaluated");
    }
    else if (entered.length || exited.length) {
      this.logger.info({
        vehicleId,
        entered,
        exited,
        lat: position.lat,
        lon: position.lon,
        ts: at.toISOString(),
      }, "zone transition");
    }

    return { vehicleId, entered, exited, at, position, duplicate: false, debounced };
  }

  private nextState(
    previous: VehicleState,
    event: ValidatedEvent,
    currentZones: string[],
    now: number
  ): VehicleStateInput {
    return {
      vehicleId: event.vehicleId,
      currentZones,
      lastEventTs: event.timestampMs,
      lastEventId: event.eventId ?? previous.lastEventId,
      lastPosition: event.position,
      lastSpeedKmh: event.speedKmh,
      lastHeadingDeg: event.headingDeg,
      lastProcessedAt: now,
    };
  }
}
