import type { DepartureRow, StopDepartures, StopDisplay } from "./models/departures";
import { formatClock, minutesUntil } from "./time";

export const LIVE_GLYPH = "🟢";
export const SCHEDULED_GLYPH = "📅";
export const NO_TRIPS_LABEL = "No upcoming trips";
export const MAX_ROWS_PER_STOP = 3;

export const formatRelativeTime = (time: Date, now: Date, withSeconds = false): string => {
  const clock = formatClock(time, withSeconds);
  const diff = minutesUntil(time, now);
  if (Math.abs(diff) < 1) return clock;
  return diff < 0 ? `${clock} (${Math.abs(diff)}m ago)` : `${clock} (in ${diff}m)`;
};

const formatStopsAway = (stopsAway: number | null): string => {
  if (stopsAway === null || stopsAway <= 0) return "";
  return ` (${stopsAway} stop${stopsAway === 1 ? "" : "s"})`;
};

export const formatDepartureRow = (row: DepartureRow, now: Date, withSeconds = false): string | null => {
  if (row.predictedTime) {
    return `${LIVE_GLYPH} ${formatRelativeTime(row.predictedTime, now, withSeconds)}${formatStopsAway(row.stopsAway)}`;
  }
  if (row.scheduledTime) {
    return `${SCHEDULED_GLYPH} ${formatRelativeTime(row.scheduledTime, now)}`;
  }
  return null;
};

const displayedRows = (rows: readonly DepartureRow[]) => rows.slice(0, MAX_ROWS_PER_STOP);

/** First displayed row carrying a prediction, scanning stops in order. */
export const findFirstLiveRow = (stops: readonly StopDepartures[]): DepartureRow | null => {
  for (const stop of stops) {
    const live = displayedRows(stop.rows).find((row) => row.predictedTime !== null);
    if (live) return live;
  }
  return null;
};

/**
 * Renders up to three rows for one stop. Only `highlightRow` gets seconds
 * precision, so a board shows seconds on a single live arrival.
 */
export const buildStopDisplay = (
  stop: StopDepartures,
  now: Date,
  highlightRow: DepartureRow | null,
): StopDisplay => {
  const times = displayedRows(stop.rows)
    .map((row) => formatDepartureRow(row, now, row === highlightRow))
    .filter((time): time is string => time !== null);

  return {
    name: stop.name,
    times: times.length > 0 ? times : [NO_TRIPS_LABEL],
  };
};
