import { renderBoard, type BoardGroup, type DepartureRow } from "@transit-board/core";
import type { BoardConfig, BoardStopConfig } from "../boardConfig";
import { isRateLimited } from "../mbta/errors";
import type { DepartureSource } from "../mbta/departureSource";
import { logger, safeErrorMessage } from "../utils/logger";
import { computeDepartureRows } from "./departureRows";

const toStopConfig = ({ routeId, stopId, directionId, isOrigin }: BoardStopConfig) => ({
  routeId,
  stopId,
  directionId,
  isOrigin,
});

const loadStopRows = async (source: DepartureSource, stop: BoardStopConfig, now: Date): Promise<DepartureRow[]> => {
  try {
    return await computeDepartureRows(source, toStopConfig(stop), now);
  } catch (error) {
    if (isRateLimited(error)) throw error;
    logger.warn(`Error fetching ${stop.label} data`, {
      stopId: stop.stopId,
      routeId: stop.routeId,
      message: safeErrorMessage(error),
    });
    return [];
  }
};

/**
 * Queries every configured stop concurrently and renders the board once all of
 * them have fulfilled. A rate limit on any stop rejects the run at once, without output.
 */
export const runBoard = async (source: DepartureSource, board: BoardConfig, now: Date): Promise<string> => {
  const groups: BoardGroup[] = await Promise.all(
    board.groups.map(async (group) => ({
      title: group.title,
      stops: await Promise.all(
        group.stops.map(async (stop) => ({
          name: stop.label,
          rows: await loadStopRows(source, stop, now),
        })),
      ),
    })),
  );

  logger.info("Board ready", {
    stops: groups.reduce((count, group) => count + group.stops.length, 0),
  });
  return renderBoard(groups, now);
};
