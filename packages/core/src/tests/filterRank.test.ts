import test from "node:test";
import assert from "node:assert/strict";
import { filterAndRankDepartures } from "../filterRank";
import type { DepartureRow } from "../models/departures";
import { addMinutes } from "../time";

const now = new Date(2026, 9, 18, 8, 0, 0);
const minutesFromNow = (minutes: number) => addMinutes(now, minutes);

const scheduled = (minutes: number): DepartureRow => ({
  scheduledTime: minutesFromNow(minutes),
  predictedTime: null,
  stopsAway: null,
});

const live = (predicted: number, scheduledAt: number | null = null): DepartureRow => ({
  scheduledTime: scheduledAt === null ? null : minutesFromNow(scheduledAt),
  predictedTime: minutesFromNow(predicted),
  stopsAway: null,
});

test("schedule-only rows up to four minutes old are kept", () => {
  const row = scheduled(-4);
  assert.deepEqual(filterAndRankDepartures([row], now), [row]);
});

test("schedule-only rows six minutes old are dropped", () => {
  assert.deepEqual(filterAndRankDepartures([scheduled(-6)], now), []);
});

test("a late prediction keeps an old scheduled trip visible", () => {
  const row = live(2, -12);
  assert.deepEqual(filterAndRankDepartures([row], now), [row]);
});

test("once live data exists, past schedule-only rows are superseded", () => {
  const running = live(1, -2);
  const missed = scheduled(-3);
  const upcoming = scheduled(3);
  assert.deepEqual(filterAndRankDepartures([running, missed, upcoming], now), [running, upcoming]);
});

test("without live data, recent past schedule rows stay", () => {
  const missed = scheduled(-3);
  const upcoming = scheduled(3);
  assert.deepEqual(filterAndRankDepartures([upcoming, missed], now), [missed, upcoming]);
});

test("rows sort by predicted time, falling back to scheduled time", () => {
  const far = live(10);
  const scheduleOnly = scheduled(2);
  const near = live(5);
  assert.deepEqual(filterAndRankDepartures([far, scheduleOnly, near], now), [scheduleOnly, near, far]);
});
