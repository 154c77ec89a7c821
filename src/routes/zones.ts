import type { FastifyInstance } from "fastify";
import { httpError } from "../lib/httpError.js";
import { ZoneParams } from "../lib/validation.js";
import type { GeofenceRouteOptions } from "./options.js";

export async function zonesRoutes(fastify: FastifyInstance, options: GeofenceRouteOptions) {
  const { service } = options;

  fastify.get("/zones", async (_request, reply) => {
    reply.header("Cache-Control", "public, max-age=300");
    return service.listZones();
  });

  fastify.get("/zones/:zoneId", async (request) => {
    const { zoneId } = ZoneParams.parse(request.params);
    const zone = service.getZone(zoneId);
    if (!zone) {
      throw httpError(404, "zone_not_found", `Unknown zone ${zoneId}`);
    }
    return zone;
  });
}
