import type { DirectionId, IsoTimestamp, RouteId, StopId, TripId, VehicleId } from "./common";

export interface StopConfig {
  routeId: RouteId;
  stopId: StopId;
  directionId: DirectionId;
  /** Origin stops use the departure time; other stops prefer arrival and fall back to departure. */
  isOrigin: boolean;
}

export interface ScheduleRecord {
  tripId: TripId;
  arrivalTime: IsoTimestamp | null;
  departureTime: IsoTimestamp | null;
}

export interface PredictionRecord {
  tripId: TripId;
  arrivalTime: IsoTimestamp | null;
  departureTime: IsoTimestamp | null;
  vehicleId: VehicleId | null;
  /** Child stop (platform) the prediction targets. */
  stopId: StopId | null;
}

/** Vehicle id -> child stop the vehicle is currently at or approaching. */
export type VehiclePositions = ReadonlyMap<VehicleId, StopId>;

/** Child stop id -> parent station id (or itself when it has no parent). */
export type StopParentMap = ReadonlyMap<StopId, StopId>;

/** Stop ids of one route and direction, in travel order. */
export type RouteStopSequence = readonly StopId[];

interface DepartureRowBase {
  stopsAway: number | null;
}

export interface ScheduledDepartureRow extends DepartureRowBase {
  scheduledTime: Date;
  predictedTime: Date | null;
}

export interface LiveDepartureRow extends DepartureRowBase {
  scheduledTime: Date | null;
  predictedTime: Date;
}

/** At least one of the two times is always present. */
export type DepartureRow = Readonly<ScheduledDepartureRow> | Readonly<LiveDepartureRow>;

export interface StopDepartures {
  name: string;
  rows: readonly DepartureRow[];
}

export interface BoardGroup {
  title: string;
  stops: readonly StopDepartures[];
}

export interface StopDisplay {
  name: string;
  times: string[];
}
