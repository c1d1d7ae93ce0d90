import assert from "node:assert/strict";
import { HttpError, MalformedResponseError } from "../src/domain/errors";
import { FetchLike, OpenAqClient } from "../src/integrations/openaq/openaq.client";
import { jsonResponse } from "./helpers";

interface Captured {
  url: string;
  headers: Record<string, string>;
}

function recordingFetch(response: () => Response, calls: Captured[]): FetchLike {
  return async (input, init) => {
    const headers = new Headers(init?.headers);
    calls.push({ url: input, headers: Object.fromEntries(headers.entries()) });
    return response();
  };
}

async function testBuildUrl() {
  const client = new OpenAqClient({ baseUrl: "https://api.example.test/v3/", apiKey: "test-secret" });
  assert.equal(
    client.buildUrl("/measurements", { location_id: 3459, limit: 1000, page: 1, date_from: null, extra: undefined }),
    "https://api.example.test/v3/measurements?location_id=3459&limit=1000&page=1"
  );
  assert.equal(client.buildUrl("locations/7"), "https://api.example.test/v3/locations/7");
  assert.equal(
    client.buildUrl("/measurements", { date_from: "2024-01-01T00:00:00Z" }),
    "https://api.example.test/v3/measurements?date_from=2024-01-01T00%3A00%3A00Z"
  );
}

async function testSendsApiKeyAndDecodes() {
  const calls: Captured[] = [];
  const client = new OpenAqClient({
    baseUrl: "https://api.example.test/v3",
    apiKey: "test-secret",
    fetchImpl: recordingFetch(() => jsonResponse({ results: [{ value: 1 }] }), calls),
  });
  const body = await client.getJson("/locations/1");
  assert.deepEqual(body, { results: [{ value: 1 }] });
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, "https://api.example.test/v3/locations/1");
  assert.equal(calls[0].headers["x-api-key"], "test-secret");
  assert.equal(calls[0].headers["accept"], "application/json");
}

async function testHttpErrorCarriesStatusAndBody() {
  const client = new OpenAqClient({
    baseUrl: "https://api.example.test/v3",
    apiKey: "test-secret",
    fetchImpl: recordingFetch(() => new Response("rate limited", { status: 429, statusText: "Too Many Requests" }), []),
  });
  await assert.rejects(client.getJson("/measurements"), (err: unknown) => {
    assert.ok(err instanceof HttpError);
    assert.equal(err.status, 429);
    assert.equal(err.responseBody, "rate limited");
    assert.equal(err.message, "GET https://api.example.test/v3/measurements failed: 429 Too Many Requests");
    return true;
  });
}

async function testNonJsonBodyIsMalformed() {
  const client = new OpenAqClient({
    baseUrl: "https://api.example.test/v3",
    apiKey: "test-secret",
    fetchImpl: recordingFetch(() => new Response("<html>gateway</html>", { status: 200 }), []),
  });
  await assert.rejects(client.getJson("/measurements"), MalformedResponseError);
}

async function run() {
  await testBuildUrl();
  await testSendsApiKeyAndDecodes();
  await testHttpErrorCarriesStatusAndBody();
  await testNonJsonBodyIsMalformed();
  console.log("openaq-client tests passed");
}

run().catch((err) => {
  console.error("openaq-client tests failed", err);
  process.exitCode = 1;
});
