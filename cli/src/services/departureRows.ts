import {
  filterAndRankDepartures,
  mergeDepartures,
  type DepartureRow,
  type RouteStopSequence,
  type StopConfig,
  type StopId,
  type StopParentMap,
} from "@transit-board/core";
import type { DepartureSource, PredictionBundle } from "../mbta/departureSource";
import { isRateLimited } from "../mbta/errors";
import { logger, safeErrorMessage } from "../utils/logger";
import { resolveParentStations } from "./stopResolver";

const fetchRouteStopsSafely = async (source: DepartureSource, stop: StopConfig): Promise<RouteStopSequence> => {
  try {
    return await source.fetchRouteStops(stop.routeId, stop.directionId);
  } catch (error) {
    logger.warn("Route stop sequence unavailable; stops-away will be omitted", {
      routeId: stop.routeId,
      directionId: stop.directionId,
      message: safeErrorMessage(error),
    });
    return [];
  }
};

/**
 * Awaits both fetches even when one fails, so a rate limit on either is never
 * hidden behind an ordinary failure of the other.
 */
const fetchBoth = async <A, B>(first: Promise<A>, second: Promise<B>): Promise<[A, B]> => {
  const [a, b] = await Promise.allSettled([first, second]);
  if (a.status === "fulfilled" && b.status === "fulfilled") return [a.value, b.value];
  const failures: unknown[] = [a, b].flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
  throw failures.find(isRateLimited) ?? failures[0];
};

/** Stops worth resolving: those of predictions whose vehicle position is known. */
const proximityStopIds = ({ predictions, vehiclePositions }: PredictionBundle): StopId[] =>
  predictions.flatMap((prediction) => {
    const vehicleStopId = prediction.vehicleId ? vehiclePositions.get(prediction.vehicleId) : undefined;
    return vehicleStopId && prediction.stopId ? [vehicleStopId, prediction.stopId] : [];
  });

/**
 * Fetches schedules and predictions for one stop and turns them into ranked
 * departure rows. Rate limits and schedule/prediction failures propagate; the
 * proximity lookups only degrade the result.
 */
export const computeDepartureRows = async (
  source: DepartureSource,
  stop: StopConfig,
  now: Date,
): Promise<DepartureRow[]> => {
  const [schedules, bundle] = await fetchBoth(source.fetchSchedules(stop, now), source.fetchPredictions(stop));

  const candidateStopIds = proximityStopIds(bundle);
  const [stopParents, routeStops]: [StopParentMap, RouteStopSequence] =
    candidateStopIds.length > 0
      ? await Promise.all([
          resolveParentStations(source, candidateStopIds, bundle.stopParents),
          fetchRouteStopsSafely(source, stop),
        ])
      : [bundle.stopParents, []];

  const rows = mergeDepartures({
    stop,
    schedules,
    predictions: bundle.predictions,
    vehiclePositions: bundle.vehiclePositions,
    stopParents,
    routeStops,
  });
  return filterAndRankDepartures(rows, now);
};
