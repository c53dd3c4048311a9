import type { StopId, StopParentMap } from "@transit-board/core";
import type { DepartureSource } from "../mbta/departureSource";
import { logger, safeErrorMessage } from "../utils/logger";

/**
 * Completes a partial child -> parent map with one batched lookup. The lookup is
 * best-effort: when it fails, unresolved stops map to themselves and proximity
 * simply comes out unknown.
 */
export const resolveParentStations = async (
  source: Pick<DepartureSource, "resolveParentStations">,
  stopIds: Iterable<StopId>,
  known: StopParentMap,
): Promise<StopParentMap> => {
  const resolved = new Map(known);
  const unresolved = [...new Set(stopIds)].filter((stopId) => !resolved.has(stopId));
  if (unresolved.length === 0) return resolved;

  try {
    const additions = await source.resolveParentStations(unresolved);
    additions.forEach((parentId, stopId) => resolved.set(stopId, parentId));
  } catch (error) {
    logger.warn("Parent station lookup failed; proximity may be unavailable", {
      stopIds: unresolved,
      message: safeErrorMessage(error),
    });
  }

  unresolved.forEach((stopId) => {
    if (!resolved.has(stopId)) resolved.set(stopId, stopId);
  });
  return resolved;
};
