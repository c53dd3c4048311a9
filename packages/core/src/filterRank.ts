import type { DepartureRow } from "./models/departures";
import { addMinutes, minutesUntil } from "./time";

/** Rows whose times are all further in the past than this are dropped. */
export const STALE_AFTER_MINUTES = 5;

const SENTINEL_OFFSET_MINUTES = 24 * 60;

const isRecent = (row: DepartureRow, now: Date): boolean => {
  const scheduledDiff = row.scheduledTime ? minutesUntil(row.scheduledTime, now) : 0;
  const predictedDiff = row.predictedTime ? minutesUntil(row.predictedTime, now) : scheduledDiff;
  return scheduledDiff > -STALE_AFTER_MINUTES || predictedDiff > -STALE_AFTER_MINUTES;
};

const isLiveOrUpcoming = (row: DepartureRow, now: Date): boolean =>
  row.predictedTime !== null || (row.scheduledTime !== null && row.scheduledTime.getTime() > now.getTime());

const effectiveTime = (row: DepartureRow, now: Date): number =>
  (row.predictedTime ?? row.scheduledTime ?? addMinutes(now, SENTINEL_OFFSET_MINUTES)).getTime();

/**
 * Drops stale rows, then, once any live prediction survives, drops schedule-only
 * rows that are not in the future. Remaining rows are ordered by predicted time,
 * falling back to scheduled time.
 */
export const filterAndRankDepartures = (rows: readonly DepartureRow[], now: Date): DepartureRow[] => {
  const recent = rows.filter((row) => isRecent(row, now));
  const hasLive = recent.some((row) => row.predictedTime !== null);
  const kept = hasLive ? recent.filter((row) => isLiveOrUpcoming(row, now)) : recent;

  return kept
    .map((row) => ({ row, at: effectiveTime(row, now) }))
    .sort((a, b) => a.at - b.at)
    .map(({ row }) => row);
};
