import type { FastifyInstance } from "fastify";
import { httpError } from "../lib/httpError.js";
import { VehicleParams } from "../lib/validation.js";
import type { GeofenceRouteOptions } from "./options.js";
import { statusBody } from "./serializers.js";

export async function vehiclesRoutes(fastify: FastifyInstance, options: GeofenceRouteOptions) {
  const { service } = options;

  fastify.get("/vehicles/:vehicleId/status", async (request) => {
    const { vehicleId } = VehicleParams.parse(request.params);
    const status = await service.getStatus(vehicleId);
    if (!status) {
      throw httpError(404, "vehicle_not_found", `No events recorded for vehicle ${vehicleId}`);
    }
    return statusBody(status);
  });
}
