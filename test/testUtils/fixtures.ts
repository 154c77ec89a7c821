import pino from "pino";
import type { CircleZone, LocationEvent, PolygonZone } from "../../src/types.js";

export const T0 = Date.parse("2024-05-01T10:00:00.000Z");

export const DOWNTOWN: CircleZone = {
  id: "downtown",
  name: "Downtown",
  type: "circle",
  center: { lat: 18.5204, lon: 73.8567 },
  radius_m: 500,
};

export const DOWNTOWN_CENTER = { lat: 18.5204, lon: 73.8567 };
// Roughly 10 km north of the downtown center.
export const TEN_KM_AWAY = { lat: 18.6104, lon: 73.8567 };

export const UNIT_SQUARE: PolygonZone = {
  id: "square",
  name: "Unit square",
  type: "polygon",
  points: [
    { lat: 0, lon: 0 },
    { lat: 0, lon: 1 },
    { lat: 1, lon: 1 },
    { lat: 1, lon: 0 },
  ],
};

export function silentLogger() {
  return pino({ level: "silent" });
}

export function testClock(start = T0) {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    set(value: number) {
      current = value;
    },
  };
}

export function locationEvent(overrides: Partial<LocationEvent> = {}): LocationEvent {
  return {
    vehicleId: "MH12AB1234",
    position: DOWNTOWN_CENTER,
    timestamp: new Date(T0),
    ...overrides,
  };
}

export function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
