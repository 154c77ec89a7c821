import type { FastifyInstance } from "fastify";
import { httpError } from "../lib/httpError.js";
import { parseTimestamp } from "../lib/time.js";
import { LocationEventBody } from "../lib/validation.js";
import type { GeofenceRouteOptions } from "./options.js";
import { transitionBody } from "./serializers.js";

export async function eventsRoutes(fastify: FastifyInstance, options: GeofenceRouteOptions) {
  const { service } = options;

  fastify.post("/events/location", async (request) => {
    const body = LocationEventBody.parse(request.body);
    const timestamp = parseTimestamp(body.timestamp);
    if (!timestamp) {
      throw httpError(400, "invalid_timestamp", "timestamp is invalid");
    }

    const result = await service.processEvent({
      vehicleId: body.vehicle_id,
      position: body.position,
      timestamp,
      eventId: body.event_id,
      speedKmh: body.speed_kmh,
      headingDeg: body.heading_deg,
    });

    return transitionBody(result);
  });
}
