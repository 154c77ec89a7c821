export type LatLon = {
  lat: number;
  lon: number;
};

export type CircleZone = {
  id: string;
  name: string;
  type: "circle";
  center: LatLon;
  radius_m: number;
};

export type PolygonZone = {
  id: string;
  name: string;
  type: "polygon";
  points: LatLon[];
};

export type Zone = CircleZone | PolygonZone;

export type LocationEvent = {
  vehicleId: string;
  position: LatLon;
  timestamp: Date;
  eventId?: string | null;
  speedKmh?: number | null;
  headingDeg?: number | null;
};

export type VehicleState = {
  vehicleId: string;
  currentZones: string[];
  lastEventTs: number | null;
  lastEventId: string | null;
  lastPosition: LatLon | null;
  lastSpeedKmh: number | null;
  lastHeadingDeg: number | null;
  lastProcessedAt: number | null;
  version: number;
};

export type VehicleStateInput = Omit<VehicleState, "version">;

export type TransitionResult = {
  vehicleId: string;
  entered: string[];
  exited: string[];
  at: Date;
  position: LatLon;
  duplicate: boolean;
  debounced: boolean;
};

export type VehicleStatus = {
  vehicleId: string;
  currentZones: string[];
  lastEventTs: Date | null;
  lastPosition: LatLon | null;
  lastSpeedKmh: number | null;
  lastHeadingDeg: number | null;
};
