export type IsoTimestamp = string;
export type RouteId = string;
export type StopId = string;
export type TripId = string;
export type VehicleId = string;

export type DirectionId = 0 | 1;
