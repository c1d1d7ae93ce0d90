import assert from "node:assert/strict";
import { computeRecordKey } from "../src/ingest/idempotency";
import { measurement } from "./helpers";

async function testKeyComponents() {
  const record = measurement({ locationId: 3459, parameterId: 2, sensorId: 100, from: "2024-01-01T00:00:00Z", to: "2024-01-01T01:00:00Z" });
  assert.equal(computeRecordKey(record), "3459|2|100|2024-01-01T00:00:00Z|2024-01-01T01:00:00Z");
}

async function testValueDoesNotChangeIdentity() {
  const a = measurement({ value: 10 });
  const b = { ...measurement({ value: 99 }), coordinates: { latitude: 1, longitude: 2 } };
  assert.equal(computeRecordKey(a), computeRecordKey(b));
}

async function testEachComponentMatters() {
  const base = computeRecordKey(measurement());
  assert.notEqual(computeRecordKey(measurement({ locationId: 1 })), base);
  assert.notEqual(computeRecordKey(measurement({ parameterId: 3 })), base);
  assert.notEqual(computeRecordKey(measurement({ sensorId: 101 })), base);
  assert.notEqual(computeRecordKey(measurement({ to: "2024-01-01T02:00:00Z" })), base);
  assert.notEqual(computeRecordKey(measurement({ from: "2024-01-02T00:00:00Z" })), base);
}

async function testMissingComponentsBecomeEmpty() {
  assert.equal(computeRecordKey({}), "||||");
  assert.equal(computeRecordKey({ locationId: 7, sensors: [] }), "7||||");
  assert.equal(computeRecordKey({ parameter: { name: "pm25" }, period: { datetimeFrom: { utc: "x" } } }), "|||x|");
}

async function testDeterministic() {
  const record = measurement();
  assert.equal(computeRecordKey(record), computeRecordKey(JSON.parse(JSON.stringify(record))));
}

async function run() {
  await testKeyComponents();
  await testValueDoesNotChangeIdentity();
  await testEachComponentMatters();
  await testMissingComponentsBecomeEmpty();
  await testDeterministic();
  console.log("record-key tests passed");
}

run().catch((err) => {
  console.error("record-key tests failed", err);
  process.exitCode = 1;
});
