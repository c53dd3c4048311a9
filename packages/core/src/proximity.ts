import type { StopId } from "./models/common";
import type { RouteStopSequence, StopParentMap } from "./models/departures";

/** Position gaps above this are index collisions rather than a real approach. */
export const MAX_STOPS_AWAY = 20;

export const toParentStation = (stopParents: StopParentMap, stopId: StopId): StopId =>
  stopParents.get(stopId) ?? stopId;

export interface ProximityInput {
  vehicleStopId: StopId;
  targetStopId: StopId;
  stopParents: StopParentMap;
  routeStops: RouteStopSequence;
}

/**
 * Counts route positions between the vehicle's current stop and the target stop,
 * both compared at parent-station level. Returns `null` when either stop is off
 * the sequence, when the vehicle is already at the stop, or past the sanity bound.
 */
export const estimateStopsAway = ({
  vehicleStopId,
  targetStopId,
  stopParents,
  routeStops,
}: ProximityInput): number | null => {
  if (routeStops.length === 0) return null;

  const vehicleIndex = routeStops.indexOf(toParentStation(stopParents, vehicleStopId));
  const targetIndex = routeStops.indexOf(toParentStation(stopParents, targetStopId));
  if (vehicleIndex < 0 || targetIndex < 0) return null;

  const distance = Math.abs(targetIndex - vehicleIndex);
  return distance > 0 && distance <= MAX_STOPS_AWAY ? distance : null;
};
