import test from "node:test";
import assert from "node:assert/strict";
import { addMinutes, formatClock, minutesUntil, parseTimestamp } from "../time";

test("parseTimestamp reads RFC 3339 timestamps with an offset", () => {
  const parsed = parseTimestamp("2026-10-18T08:00:00-04:00");
  assert.equal(parsed?.getTime(), Date.UTC(2026, 9, 18, 12, 0, 0));
});

test("parseTimestamp treats missing or malformed values as absent", () => {
  assert.equal(parseTimestamp(null), null);
  assert.equal(parseTimestamp(undefined), null);
  assert.equal(parseTimestamp(""), null);
  assert.equal(parseTimestamp("soon"), null);
  assert.equal(parseTimestamp("10/18/2026"), null);
  assert.equal(parseTimestamp("2026-10-18T25:61:00Z"), null);
});

test("parseTimestamp rejects calendar dates that do not exist", () => {
  assert.equal(parseTimestamp("2026-02-30T08:00:00Z"), null);
  assert.equal(parseTimestamp("2026-04-31T08:00:00Z"), null);
  assert.equal(parseTimestamp("2026-13-01T08:00:00Z"), null);
  assert.equal(parseTimestamp("2028-02-29T08:00:00Z")?.getTime(), Date.UTC(2028, 1, 29, 8, 0, 0));
});

test("minutesUntil truncates toward zero in both directions", () => {
  const now = new Date(2026, 9, 18, 8, 0, 0);
  assert.equal(minutesUntil(new Date(2026, 9, 18, 8, 5, 30), now), 5);
  assert.equal(minutesUntil(new Date(2026, 9, 18, 7, 54, 30), now), -5);
  assert.ok(Object.is(minutesUntil(new Date(2026, 9, 18, 7, 59, 30), now), 0));
});

test("addMinutes shifts by whole minutes", () => {
  const now = new Date(2026, 9, 18, 8, 0, 0);
  assert.equal(addMinutes(now, -30).getTime(), new Date(2026, 9, 18, 7, 30, 0).getTime());
});

test("formatClock renders local wall-clock time", () => {
  const time = new Date(2026, 9, 18, 7, 5, 9);
  assert.equal(formatClock(time), "07:05");
  assert.equal(formatClock(time, true), "07:05:09");
});
