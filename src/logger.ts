import pino from "pino";
import type { ServiceConfig } from "./config.js";

export function createLogger(config: Pick<ServiceConfig, "LOG_LEVEL">) {
  return pino({
    name: "geofence",
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
