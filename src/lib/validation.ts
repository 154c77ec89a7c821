import { z } from "zod";

export const LatLon = z.object({
  lat: z.number().finite().min(-90).max(90),
  lon: z.number().finite().min(-180).max(180),
});
export type LatLon = z.infer<typeof LatLon>;

export const LocationEventBody = z.object({
  vehicle_id: z.string().trim().min(1),
  position: LatLon,
  timestamp: z.string().datetime({ offset: true }),
  speed_kmh: z.number().finite().nonnegative().nullish(),
  heading_deg: z.number().finite().min(0).max(360).nullish(),
  event_id: z.string().trim().min(1).nullish(),
}).strict();
export type LocationEventBody = z.infer<typeof LocationEventBody>;

export const CircleZoneDefinition = z.object({
  id: z.string().trim().min(1),
  name: z.string().min(1),
  type: z.literal("circle"),
  center: LatLon,
  radius_m: z.number().finite().positive(),
});

export const PolygonZoneDefinition = z.object({
  id: z.string().trim().min(1),
  name: z.string().min(1),
  type: z.literal("polygon"),
  points: z.array(LatLon).min(3),
});

export const ZoneDefinition = z.discriminatedUnion("type", [CircleZoneDefinition, PolygonZoneDefinition]);
export type ZoneDefinition = z.infer<typeof ZoneDefinition>;

export const ZoneFile = z.object({ zones: z.array(ZoneDefinition) });
export type ZoneFile = z.infer<typeof ZoneFile>;

export const VehicleParams = z.object({ vehicleId: z.string().trim().min(1) });
export const ZoneParams = z.object({ zoneId: z.string().trim().min(1) });
