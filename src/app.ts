import Fastify, { type FastifyServerOptions } from "fastify";
import compress from "@fastify/compress";
import cors from "@fastify/cors";
import { sendHttpError, toHttpError } from "./lib/httpError.js";
import type { GeofenceService } from "./services/geofenceService.js";
import { eventsRoutes } from "./routes/events.js";
import { vehiclesRoutes } from "./routes/vehicles.js";
import { zonesRoutes } from "./routes/zones.js";

export type BuildAppOptions = {
  service: GeofenceService;
  env: string;
  server?: FastifyServerOptions;
};

export async function buildApp(options: BuildAppOptions) {
  const { service, env } = options;
  const app = Fastify(options.server ?? { logger: false });

  app.setErrorHandler((err, request, reply) => {
    const normalized = toHttpError(err);
    if (normalized.statusCode >= 500) {
      request.log.error({ err }, "request failed");
    }
    return sendHttpError(reply, err);
  });

  await app.register(cors, { origin: true });
  await app.register(compress);

  app.get("/health", async () => {
    const health = await service.health();
    return { status: "ok", env, ...health, timestamp: new Date().toISOString() };
  });

  await app.register(zonesRoutes, { service });
  await app.register(vehiclesRoutes, { service });
  await app.register(eventsRoutes, { service });

  await app.ready();
  return app;
}
