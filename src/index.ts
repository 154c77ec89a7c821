import { config as loadEnv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createGeofenceService, engineSettingsFromConfig } from "./services/geofenceService.js";
import { InMemoryVehicleStateStore } from "./services/vehicleStateStore.js";
import { loadZoneRegistry } from "./services/zoneLoader.js";

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const serviceRoot = path.resolve(thisDir, "..");
const envFiles = [".env", ".env.local"];
for (const file of envFiles) {
  loadEnv({ path: path.join(serviceRoot, file), override: true });
}

async function bootstrap() {
  const config = loadConfig();
  const logger = createLogger(config);

  const zonesPath = path.resolve(serviceRoot, config.ZONES_CONFIG_PATH);
  const registry = await loadZoneRegistry(zonesPath).catch((err: unknown) => {
    logger.fatal({ err, zonesPath }, "Failed to load zone definitions");
    process.exit(1);
  });
  logger.info({ zones: registry.size, zonesPath }, "Loaded zone definitions");

  const service = createGeofenceService({
    registry,
    store: new InMemoryVehicleStateStore(),
    settings: engineSettingsFromConfig(config),
    logger,
  });

  const app = await buildApp({
    service,
    env: config.NODE_ENV,
    server: {
      logger: {
        level: config.LOG_LEVEL
      }
    }
  });

  const close = async () => {
    app.log.info("Shutting down");
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", close);
  process.on("SIGTERM", close);

  try {
    await app.listen({
      port: config.port,
      host: config.host
    });
    app.log.info(`Geofence service listening on http://${config.host}:${config.port}`);
  }
  catch (err) {
    app.log.error({ err }, "Failed to start geofence service");
    process.exit(1);
  }
}

void bootstrap();
