import type { FastifyPluginOptions } from "fastify";
import type { GeofenceService } from "../services/geofenceService.js";

export interface GeofenceRouteOptions extends FastifyPluginOptions {
  service: GeofenceService;
}
