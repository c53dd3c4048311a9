import type { TripId } from "./models/common";
import type {
  DepartureRow,
  PredictionRecord,
  RouteStopSequence,
  ScheduleRecord,
  StopConfig,
  StopParentMap,
  VehiclePositions,
} from "./models/departures";
import { estimateStopsAway } from "./proximity";
import { parseTimestamp } from "./time";

export interface MergeInput {
  stop: StopConfig;
  schedules: readonly ScheduleRecord[];
  predictions: readonly PredictionRecord[];
  vehiclePositions: VehiclePositions;
  stopParents: StopParentMap;
  routeStops: RouteStopSequence;
}

const selectStopTime = (
  isOrigin: boolean,
  times: Pick<ScheduleRecord, "arrivalTime" | "departureTime">,
): Date | null => {
  const raw = isOrigin ? times.departureTime : times.arrivalTime ?? times.departureTime;
  return parseTimestamp(raw);
};

export const createDepartureRow = (
  scheduledTime: Date | null,
  predictedTime: Date | null,
  stopsAway: number | null,
): DepartureRow | null => {
  if (predictedTime) return { scheduledTime, predictedTime, stopsAway };
  if (scheduledTime) return { scheduledTime, predictedTime, stopsAway };
  return null;
};

const computeStopsAway = (prediction: PredictionRecord, input: MergeInput): number | null => {
  const vehicleStopId = prediction.vehicleId ? input.vehiclePositions.get(prediction.vehicleId) : undefined;
  if (!vehicleStopId || !prediction.stopId || input.routeStops.length === 0) return null;
  return estimateStopsAway({
    vehicleStopId,
    targetStopId: prediction.stopId,
    stopParents: input.stopParents,
    routeStops: input.routeStops,
  });
};

/**
 * Joins schedules and predictions on trip id. The board is schedule-driven:
 * predictions for trips that are not scheduled at this stop are dropped.
 */
export const mergeDepartures = (input: MergeInput): DepartureRow[] => {
  const predictionsByTrip = new Map<TripId, PredictionRecord>();
  input.predictions.forEach((prediction) => {
    predictionsByTrip.set(prediction.tripId, prediction);
  });

  const rows: DepartureRow[] = [];
  input.schedules.forEach((schedule) => {
    const scheduledTime = selectStopTime(input.stop.isOrigin, schedule);
    const prediction = predictionsByTrip.get(schedule.tripId);
    const predictedTime = prediction ? selectStopTime(input.stop.isOrigin, prediction) : null;
    const stopsAway = prediction ? computeStopsAway(prediction, input) : null;

    const row = createDepartureRow(scheduledTime, predictedTime, stopsAway);
    if (row) rows.push(row);
  });
  return rows;
};
