import {
  addMinutes,
  formatClock,
  type DirectionId,
  type PredictionRecord,
  type RouteId,
  type RouteStopSequence,
  type ScheduleRecord,
  type StopConfig,
  type StopId,
  type StopParentMap,
  type VehicleId,
  type VehiclePositions,
} from "@transit-board/core";
import type { JsonApiIncludedResource } from "../models/jsonApi";
import type { MbtaPrediction, MbtaSchedule, MbtaStop } from "../models/mbta";
import { extractFirstRelationshipId } from "../utils/jsonApi";
import { logger } from "../utils/logger";
import type { MbtaClient, QueryParams } from "./client";

export const SCHEDULE_LOOKBACK_MINUTES = 30;
export const SCHEDULE_PAGE_LIMIT = 20;
export const PREDICTION_PAGE_LIMIT = 3;

export interface PredictionBundle {
  predictions: PredictionRecord[];
  vehiclePositions: VehiclePositions;
  /** Parents already known from sideloaded stops; completed by the stop resolver. */
  stopParents: StopParentMap;
}

/** Everything the departure pipeline needs from the outside world for one stop. */
export interface DepartureSource {
  fetchSchedules(stop: StopConfig, now: Date): Promise<ScheduleRecord[]>;
  fetchPredictions(stop: StopConfig): Promise<PredictionBundle>;
  resolveParentStations(stopIds: readonly StopId[]): Promise<StopParentMap>;
  fetchRouteStops(routeId: RouteId, directionId: DirectionId): Promise<RouteStopSequence>;
}

type MbtaApi = Pick<MbtaClient, "getSchedules" | "getPredictions" | "getStops">;

const stopFilters = (stop: StopConfig): QueryParams => ({
  "filter[stop]": stop.stopId,
  "filter[route]": stop.routeId,
  "filter[direction_id]": stop.directionId,
  sort: "arrival_time",
});

export const parentOf = (stop: Pick<MbtaStop, "id" | "relationships">): StopId =>
  extractFirstRelationshipId(stop.relationships?.parent_station) ?? stop.id;

export const toScheduleRecord = (schedule: MbtaSchedule): ScheduleRecord | null => {
  const tripId = extractFirstRelationshipId(schedule.relationships?.trip);
  if (!tripId) return null;
  return {
    tripId,
    arrivalTime: schedule.attributes.arrival_time,
    departureTime: schedule.attributes.departure_time,
  };
};

export const toPredictionRecord = (prediction: MbtaPrediction): PredictionRecord | null => {
  const tripId = extractFirstRelationshipId(prediction.relationships?.trip);
  if (!tripId) return null;
  return {
    tripId,
    arrivalTime: prediction.attributes.arrival_time,
    departureTime: prediction.attributes.departure_time,
    vehicleId: extractFirstRelationshipId(prediction.relationships?.vehicle),
    stopId: extractFirstRelationshipId(prediction.relationships?.stop),
  };
};

export const indexIncluded = (included: readonly JsonApiIncludedResource[] = []) => {
  const vehiclePositions = new Map<VehicleId, StopId>();
  const stopParents = new Map<StopId, StopId>();
  included.forEach((resource) => {
    if (resource.type === "vehicle") {
      const stopId = extractFirstRelationshipId(resource.relationships?.stop);
      if (stopId) vehiclePositions.set(resource.id, stopId);
      return;
    }
    if (resource.type === "stop") {
      stopParents.set(resource.id, parentOf(resource));
    }
  });
  return { vehiclePositions, stopParents };
};

const isPresent = <T>(value: T | null): value is T => value !== null;

export const createMbtaDepartureSource = (client: MbtaApi): DepartureSource => ({
  async fetchSchedules(stop, now) {
    const response = await client.getSchedules({
      ...stopFilters(stop),
      // Look back to catch delayed trips that are still on their way.
      "filter[min_time]": formatClock(addMinutes(now, -SCHEDULE_LOOKBACK_MINUTES)),
      "page[limit]": SCHEDULE_PAGE_LIMIT,
    });
    const records = response.data.map(toScheduleRecord).filter(isPresent);
    if (records.length < response.data.length) {
      logger.debug("Skipped schedules without a trip", {
        stopId: stop.stopId,
        skipped: response.data.length - records.length,
      });
    }
    return records;
  },

  async fetchPredictions(stop) {
    const response = await client.getPredictions({
      ...stopFilters(stop),
      "page[limit]": PREDICTION_PAGE_LIMIT,
      include: "vehicle,stop",
    });
    return {
      predictions: response.data.map(toPredictionRecord).filter(isPresent),
      ...indexIncluded(response.included),
    };
  },

  async resolveParentStations(stopIds) {
    const response = await client.getStops({ "filter[id]": [...stopIds] });
    return new Map(response.data.map((stop) => [stop.id, parentOf(stop)]));
  },

  async fetchRouteStops(routeId, directionId) {
    const response = await client.getStops({
      "filter[route]": routeId,
      "filter[direction_id]": directionId,
    });
    return response.data.map((stop) => stop.id);
  },
});
