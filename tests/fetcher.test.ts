import assert from "node:assert/strict";
import { noopLogger } from "../src/config/logger";
import { FetchLike, OpenAqClient } from "../src/integrations/openaq/openaq.client";
import { computeRecordKey, mergeIncremental } from "../src/ingest/idempotency";
import { BulkStrategy, createStrategies, decodePage, PerSensorStrategy, sensorAttribution, stampProvenance } from "../src/integrations/openaq/strategies";
import { StrategyFetcher } from "../src/services/fetcher.service";
import { hour, jsonResponse, noSleep } from "./helpers";

type Route = (url: URL) => Response | undefined;

// Unrouted requests answer 500 so a missing route shows up as a failure
function fakeApi(routes: Route[], seen: URL[] = []): FetchLike {
  return async (input) => {
    const url = new URL(input);
    seen.push(url);
    for (const route of routes) {
      const res = route(url);
      if (res) return res;
    }
    return new Response("unrouted", { status: 500 });
  };
}

function fetcherFor(fetchImpl: FetchLike, sleeps: number[] = []) {
  const client = new OpenAqClient({ baseUrl: "https://api.example.test/v3", apiKey: "test-secret", fetchImpl });
  const strategies = createStrategies(["bulk", "per-sensor"], {
    client,
    rateLimitDelayMs: 200,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    logger: noopLogger,
  });
  return new StrategyFetcher(strategies, { logger: noopLogger });
}

function pageOf(url: URL): number {
  return Number(url.searchParams.get("page"));
}

async function testBulkPaginatesUntilShortPage() {
  const seen: URL[] = [];
  const sleeps: number[] = [];
  const fetcher = fetcherFor(
    fakeApi(
      [
        (url) => {
          if (url.pathname !== "/v3/measurements") return undefined;
          const page = pageOf(url);
          if (page === 1) return jsonResponse({ results: [hour(0), hour(1)] });
          if (page === 2) return jsonResponse({ results: [hour(2)] });
          return undefined;
        },
      ],
      seen
    ),
    sleeps
  );
  const report = await fetcher.fetchSince(3459, null, 2);
  assert.equal(report.strategy, "bulk");
  assert.equal(report.records.length, 3);
  assert.deepEqual(report.incompleteSensors, []);
  assert.deepEqual(report.unavailable, []);
  assert.equal(seen.length, 2);
  assert.equal(seen[0].searchParams.get("location_id"), "3459");
  assert.equal(seen[0].searchParams.get("limit"), "2");
  assert.equal(seen[0].searchParams.has("date_from"), false);
  assert.deepEqual(sleeps, [200]);
}

async function testSinceIsSentAsDateFrom() {
  const seen: URL[] = [];
  const fetcher = fetcherFor(fakeApi([() => jsonResponse({ results: [hour(5)] })], seen));
  await fetcher.fetchSince(3459, "2024-01-01T04:00:00Z", 1000);
  assert.equal(seen[0].searchParams.get("date_from"), "2024-01-01T04:00:00Z");
}

const locationRoute: Route = (url) =>
  url.pathname === "/v3/locations/3459"
    ? jsonResponse({ results: [{ id: 3459, sensors: [{ id: 11, parameter: { name: "pm25" } }, { id: 12, parameter: { name: "no2" } }] }] })
    : undefined;

async function testBulkFailureFallsBackToPerSensor() {
  const seen: URL[] = [];
  const fetcher = fetcherFor(
    fakeApi(
      [
        (url) => (url.pathname === "/v3/measurements" ? new Response("gone", { status: 410 }) : undefined),
        locationRoute,
        (url) => (url.pathname === "/v3/sensors/11/measurements" ? jsonResponse({ results: [{ value: 1, period: hour(0).period }] }) : undefined),
        (url) => (url.pathname === "/v3/sensors/12/measurements" ? jsonResponse({ results: [{ value: 2, period: hour(0).period }] }) : undefined),
      ],
      seen
    )
  );
  const report = await fetcher.fetchSince(3459, null, 1000);
  assert.equal(report.strategy, "per-sensor");
  assert.equal(report.unavailable.length, 1);
  assert.equal(report.unavailable[0].strategy, "bulk");
  assert.equal(report.records.length, 2);
  // provenance stamped so the two sensors keep distinct identities
  assert.deepEqual(
    report.records.map((r) => [r.locationId, r.sensors?.[0]?.id]),
    [
      [3459, 11],
      [3459, 12],
    ]
  );
}

async function testEmptyBulkFallsBackToPerSensor() {
  const fetcher = fetcherFor(
    fakeApi([
      (url) => (url.pathname === "/v3/measurements" ? jsonResponse({ results: [] }) : undefined),
      locationRoute,
      (url) => (url.pathname === "/v3/sensors/11/measurements" ? jsonResponse({ results: [hour(0, { sensorId: 11 })] }) : undefined),
      (url) => (url.pathname === "/v3/sensors/12/measurements" ? jsonResponse({ results: null }) : undefined),
    ])
  );
  const report = await fetcher.fetchSince(3459, null, 1000);
  assert.equal(report.strategy, "per-sensor");
  assert.equal(report.records.length, 1);
  assert.deepEqual(report.unavailable, []);
}

async function testPartialSensorFailureKeepsCompletedPages() {
  const fetcher = fetcherFor(
    fakeApi([
      (url) => (url.pathname === "/v3/measurements" ? new Response("down", { status: 503 }) : undefined),
      locationRoute,
      (url) => {
        if (url.pathname !== "/v3/sensors/11/measurements") return undefined;
        if (pageOf(url) === 1) return jsonResponse({ results: [hour(0, { sensorId: 11 }), hour(1, { sensorId: 11 })] });
        return new Response("timeout", { status: 504 });
      },
      (url) => (url.pathname === "/v3/sensors/12/measurements" ? jsonResponse({ results: [hour(0, { sensorId: 12 })] }) : undefined),
    ])
  );
  const report = await fetcher.fetchSince(3459, null, 2);
  assert.equal(report.strategy, "per-sensor");
  assert.equal(report.records.length, 3);
  assert.deepEqual(report.incompleteSensors, [11]);
}

async function testMalformedPageEndsSensorPagination() {
  const fetcher = fetcherFor(
    fakeApi([
      (url) => (url.pathname === "/v3/measurements" ? new Response("down", { status: 503 }) : undefined),
      locationRoute,
      (url) => {
        if (url.pathname !== "/v3/sensors/11/measurements") return undefined;
        if (pageOf(url) === 1) return jsonResponse({ results: [hour(0, { sensorId: 11 })] });
        return new Response("not json at all", { status: 200 });
      },
      (url) => (url.pathname === "/v3/sensors/12/measurements" ? jsonResponse({ results: "oops" }) : undefined),
    ])
  );
  const report = await fetcher.fetchSince(3459, null, 1);
  assert.equal(report.records.length, 1);
  assert.deepEqual(report.incompleteSensors, [11, 12]);
}

async function testUnknownLocationIsEmpty() {
  const fetcher = fetcherFor(
    fakeApi([
      (url) => (url.pathname === "/v3/measurements" ? jsonResponse({ results: [] }) : undefined),
      (url) => (url.pathname === "/v3/locations/999" ? new Response("not found", { status: 404 }) : undefined),
    ])
  );
  const report = await fetcher.fetchSince(999, null, 1000);
  assert.deepEqual(report, { records: [], strategy: "bulk", incompleteSensors: [], unavailable: [] });
}

async function testAllStrategiesUnavailable() {
  const fetcher = fetcherFor(fakeApi([]));
  const report = await fetcher.fetchSince(3459, null, 1000);
  assert.deepEqual(report.records, []);
  assert.equal(report.strategy, null);
  assert.deepEqual(
    report.unavailable.map((u) => u.strategy),
    ["bulk", "per-sensor"]
  );
}

async function testDecodePage() {
  assert.deepEqual(decodePage([]), { ok: false, reason: "body is not an object" });
  assert.deepEqual(decodePage({ meta: {} }), { ok: true, records: [], received: 0, dropped: 0 });
  assert.deepEqual(decodePage({ results: {} }), { ok: false, reason: "results is not a list" });
  const decoded = decodePage({ results: [hour(0), "junk", { value: { bad: true } }] });
  assert.ok(decoded.ok);
  assert.equal(decoded.received, 3);
  assert.equal(decoded.dropped, 2);
}

async function testStampProvenanceKeepsExistingIds() {
  const record = hour(0, { locationId: 1, sensorId: 2 });
  assert.equal(stampProvenance(record, 3459, 99), record);
  const { locationId: _locationId, sensors: _sensors, ...bare } = record;
  assert.deepEqual(stampProvenance(bare, 3459, 99), { ...bare, locationId: 3459, sensors: [{ id: 99 }] });
  assert.deepEqual(stampProvenance(bare, 3459), { ...bare, locationId: 3459 });
}

async function testStrategiesUsableDirectly() {
  const client = new OpenAqClient({
    baseUrl: "https://api.example.test/v3",
    apiKey: "test-secret",
    fetchImpl: fakeApi([(url) => (url.pathname === "/v3/locations/5" ? jsonResponse({ results: [{ id: 5, sensors: [] }] }) : undefined)]),
  });
  const options = { client, rateLimitDelayMs: 0, sleep: noSleep, logger: noopLogger };
  assert.deepEqual(await new PerSensorStrategy(options).fetch({ locationId: 5, since: null, pageSize: 10 }), {
    kind: "fetched",
    records: [],
    incompleteSensors: [],
  });
  const bulk = await new BulkStrategy(options).fetch({ locationId: 5, since: null, pageSize: 10 });
  assert.equal(bulk.kind, "unavailable");
}

// Same observation as the API returns it from /measurements, without sensor ids
function withoutSensors(h: number) {
  const { sensors: _sensors, ...bare } = hour(h);
  return bare;
}

function sensorsRoute(sensors: Array<{ id: number; parameter: { id: number; name: string } }>): Route {
  return (url) => (url.pathname === "/v3/locations/3459" ? jsonResponse({ results: [{ id: 3459, sensors }] }) : undefined);
}

async function testBulkAndPerSensorKeyTheSameObservation() {
  const sensors = sensorsRoute([
    { id: 70, parameter: { id: 2, name: "pm25" } },
    { id: 71, parameter: { id: 5, name: "no2" } },
  ]);
  const seen: URL[] = [];
  const bulk = await fetcherFor(
    fakeApi([(url) => (url.pathname === "/v3/measurements" ? jsonResponse({ results: [withoutSensors(3)] }) : undefined), sensors], seen)
  ).fetchSince(3459, null, 1000);
  assert.equal(bulk.strategy, "bulk");
  assert.deepEqual(bulk.records, [{ ...withoutSensors(3), sensors: [{ id: 70 }] }]);
  assert.deepEqual(
    seen.map((u) => u.pathname),
    ["/v3/measurements", "/v3/locations/3459"]
  );

  const perSensor = await fetcherFor(
    fakeApi([
      (url) => (url.pathname === "/v3/measurements" ? new Response("down", { status: 503 }) : undefined),
      sensors,
      (url) => (url.pathname === "/v3/sensors/70/measurements" ? jsonResponse({ results: [withoutSensors(3)] }) : undefined),
      (url) => (url.pathname === "/v3/sensors/71/measurements" ? jsonResponse({ results: [] }) : undefined),
    ])
  ).fetchSince(3459, null, 1000);
  assert.equal(perSensor.strategy, "per-sensor");

  assert.equal(computeRecordKey(bulk.records[0]), "3459|2|70|2024-01-01T03:00:00Z|2024-01-01T04:00:00Z");
  assert.equal(computeRecordKey(perSensor.records[0]), computeRecordKey(bulk.records[0]));
  // an archive built by one strategy sees the other's copy as a duplicate
  const merged = mergeIncremental(bulk.records, perSensor.records);
  assert.equal(merged.addedCount, 0);
  assert.equal(merged.duplicateCount, 1);
  assert.equal(merged.merged.length, 1);
}

async function testAmbiguousBulkRecordsFallBackToPerSensor() {
  const report = await fetcherFor(
    fakeApi([
      (url) => (url.pathname === "/v3/measurements" ? jsonResponse({ results: [withoutSensors(3)] }) : undefined),
      sensorsRoute([
        { id: 70, parameter: { id: 2, name: "pm25" } },
        { id: 72, parameter: { id: 2, name: "pm25" } },
      ]),
      (url) => (url.pathname === "/v3/sensors/70/measurements" ? jsonResponse({ results: [withoutSensors(3)] }) : undefined),
      (url) => (url.pathname === "/v3/sensors/72/measurements" ? jsonResponse({ results: [withoutSensors(3)] }) : undefined),
    ])
  ).fetchSince(3459, null, 1000);
  assert.equal(report.strategy, "per-sensor");
  assert.deepEqual(report.unavailable, [{ strategy: "bulk", reason: "1 record(s) cannot be attributed to a single sensor" }]);
  assert.deepEqual(
    report.records.map((r) => r.sensors?.[0]?.id),
    [70, 72]
  );
}

async function testSensorAttribution() {
  const attribute = sensorAttribution([
    { id: 70, parameter: { id: 2, name: "pm25" } },
    { id: 71, parameter: { name: "no2" } },
    { id: 72, parameter: { id: 7, name: "o3" } },
    { id: 73, parameter: { id: 7, name: "o3" } },
    { parameter: { id: 9, name: "co" } },
  ]);
  assert.equal(attribute(hour(0, { sensorId: 5 })), 5);
  assert.equal(attribute(withoutSensors(0)), 70);
  assert.equal(attribute({ value: 1, parameter: { name: "no2" } }), 71);
  assert.equal(attribute({ value: 1, parameter: { id: 7, name: "o3" } }), undefined);
  assert.equal(attribute({ value: 1, parameter: { id: 9, name: "co" } }), undefined);
  assert.equal(attribute({ value: 1 }), undefined);
}

async function run() {
  await testBulkPaginatesUntilShortPage();
  await testSinceIsSentAsDateFrom();
  await testBulkFailureFallsBackToPerSensor();
  await testEmptyBulkFallsBackToPerSensor();
  await testPartialSensorFailureKeepsCompletedPages();
  await testMalformedPageEndsSensorPagination();
  await testUnknownLocationIsEmpty();
  await testAllStrategiesUnavailable();
  await testDecodePage();
  await testStampProvenanceKeepsExistingIds();
  await testStrategiesUsableDirectly();
  await testBulkAndPerSensorKeyTheSameObservation();
  await testAmbiguousBulkRecordsFallBackToPerSensor();
  await testSensorAttribution();
  console.log("fetcher tests passed");
}

run().catch((err) => {
  console.error("fetcher tests failed", err);
  process.exitCode = 1;
});
