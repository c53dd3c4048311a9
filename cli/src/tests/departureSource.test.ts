import test from "node:test";
import assert from "node:assert/strict";
import type { StopConfig } from "@transit-board/core";
import { MbtaClient } from "../mbta/client";
import { createMbtaDepartureSource } from "../mbta/departureSource";
import { createFakeFetch, ref } from "./fakeFetch";

const stop: StopConfig = { routeId: "60", stopId: "1519", directionId: 0, isOrigin: false };
const now = new Date(2026, 9, 18, 8, 0, 0);

const buildSource = (bodies: Record<string, unknown>) => {
  const fake = createFakeFetch((url) => ({ body: bodies[url.pathname] ?? { data: [] } }));
  const client = new MbtaClient({
    baseUrl: "https://mbta.test",
    fetch: fake.fetchImpl,
    retry: { maxRetries: 0 },
    timeoutMs: 0,
  });
  return { source: createMbtaDepartureSource(client), requests: fake.requests };
};

test("fetchSchedules looks back thirty minutes and keeps trip-linked schedules", async () => {
  const { source, requests } = buildSource({
    "/schedules": {
      data: [
        {
          id: "s1",
          type: "schedule",
          attributes: { arrival_time: "2026-10-18T08:04:00-04:00", departure_time: "2026-10-18T08:04:00-04:00" },
          relationships: { trip: ref("trip", "t1") },
        },
        {
          id: "s2",
          type: "schedule",
          attributes: { arrival_time: null, departure_time: "2026-10-18T08:24:00-04:00" },
          relationships: { trip: { data: null } },
        },
      ],
    },
  });

  const schedules = await source.fetchSchedules(stop, now);

  assert.deepEqual(schedules, [
    { tripId: "t1", arrivalTime: "2026-10-18T08:04:00-04:00", departureTime: "2026-10-18T08:04:00-04:00" },
  ]);
  const params = requests[0]?.url.searchParams;
  assert.equal(params?.get("filter[stop]"), "1519");
  assert.equal(params?.get("filter[route]"), "60");
  assert.equal(params?.get("filter[direction_id]"), "0");
  assert.equal(params?.get("sort"), "arrival_time");
  assert.equal(params?.get("filter[min_time]"), "07:30");
  assert.equal(params?.get("page[limit]"), "20");
});

test("fetchPredictions indexes sideloaded vehicles and stops", async () => {
  const { source, requests } = buildSource({
    "/predictions": {
      data: [
        {
          id: "p1",
          type: "prediction",
          attributes: { arrival_time: "2026-10-18T08:06:00-04:00", departure_time: null },
          relationships: { trip: ref("trip", "t1"), vehicle: ref("vehicle", "y1901"), stop: ref("stop", "1519") },
        },
        {
          id: "p2",
          type: "prediction",
          attributes: { arrival_time: "2026-10-18T08:26:00-04:00", departure_time: null },
          relationships: { trip: ref("trip", "t2"), vehicle: { data: null }, stop: ref("stop", "1519") },
        },
      ],
      included: [
        { id: "y1901", type: "vehicle", attributes: { latitude: 42.3 }, relationships: { stop: ref("stop", "1510") } },
        { id: "1519", type: "stop", attributes: {}, relationships: { parent_station: { data: null } } },
        { id: "70150", type: "stop", attributes: {}, relationships: { parent_station: ref("stop", "place-kencl") } },
      ],
    },
  });

  const bundle = await source.fetchPredictions(stop);

  assert.deepEqual(bundle.predictions, [
    { tripId: "t1", arrivalTime: "2026-10-18T08:06:00-04:00", departureTime: null, vehicleId: "y1901", stopId: "1519" },
    { tripId: "t2", arrivalTime: "2026-10-18T08:26:00-04:00", departureTime: null, vehicleId: null, stopId: "1519" },
  ]);
  assert.deepEqual([...bundle.vehiclePositions], [["y1901", "1510"]]);
  assert.deepEqual([...bundle.stopParents], [
    ["1519", "1519"],
    ["70150", "place-kencl"],
  ]);
  const params = requests[0]?.url.searchParams;
  assert.equal(params?.get("include"), "vehicle,stop");
  assert.equal(params?.get("page[limit]"), "3");
});

test("resolveParentStations issues one batched stop lookup", async () => {
  const { source, requests } = buildSource({
    "/stops": {
      data: [
        { id: "70150", type: "stop", attributes: {}, relationships: { parent_station: ref("stop", "place-kencl") } },
        { id: "1510", type: "stop", attributes: {}, relationships: {} },
      ],
    },
  });

  const parents = await source.resolveParentStations(["70150", "1510"]);

  assert.deepEqual([...parents], [
    ["70150", "place-kencl"],
    ["1510", "1510"],
  ]);
  assert.equal(requests.length, 1);
  assert.equal(requests[0]?.url.searchParams.get("filter[id]"), "70150,1510");
});

test("fetchRouteStops keeps the order the API returns", async () => {
  const { source, requests } = buildSource({
    "/stops": {
      data: [
        { id: "place-kencl", type: "stop", attributes: {} },
        { id: "1510", type: "stop", attributes: {} },
        { id: "1519", type: "stop", attributes: {} },
      ],
    },
  });

  assert.deepEqual(await source.fetchRouteStops("60", 1), ["place-kencl", "1510", "1519"]);
  assert.equal(requests[0]?.url.searchParams.get("filter[route]"), "60");
  assert.equal(requests[0]?.url.searchParams.get("filter[direction_id]"), "1");
});
