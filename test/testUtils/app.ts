import { buildApp } from "../../src/app.js";
import { createGeofenceService } from "../../src/services/geofenceService.js";
import { ZoneRegistry } from "../../src/services/zoneRegistry.js";
import { DOWNTOWN, silentLogger, testClock, UNIT_SQUARE } from "./fixtures.js";

export async function buildTestApp() {
  const clock = testClock();
  const service = createGeofenceService({
    registry: new ZoneRegistry([DOWNTOWN, UNIT_SQUARE]),
    settings: { debounceMs: 2_000, maxFutureSkewMs: 5_000 },
    logger: silentLogger(),
    now: clock.now,
  });
  const app = await buildApp({ service, env: "test" });
  return { app, service, clock };
}
