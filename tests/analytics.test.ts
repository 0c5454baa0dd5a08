import assert from "node:assert/strict";
import { afterEach, beforeEach, test } from "node:test";
import {
  createAnalyticsClient,
  extractAnswerText,
  unwrapEnvelope
} from "../src/services/analytics.js";
import { isHttpError } from "../src/utils/http.js";

type FetchCall = { url: string; init?: RequestInit };

const originalFetch = globalThis.fetch;
const originalEnv = { ...process.env };
let calls: FetchCall[] = [];

function mockFetch(body: string, status = 200) {
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit) => {
    calls.push({ url: String(input), init });
    return new Response(body, { status });
  };
}

const client = createAnalyticsClient({
  chart: { spaceName: "json_generator", flowId: "json-flow" }
});

beforeEach(() => {
  calls = [];
  process.env.ANALYTICS_API_TOKEN = "test-token";
  process.env.ANALYTICS_BASE_URL = "https://analytics.example.test/chat";
});

afterEach(() => {
  globalThis.fetch = originalFetch;
  process.env = { ...originalEnv };
});

test("posts the query with the destination's backend target", async () => {
  mockFetch('{"status":"success","data":[]}');
  const body = await client.send("chart", "plot revenue");

  assert.equal(body, '{"status":"success","data":[]}');
  assert.equal(calls.length, 1);
  const [call] = calls;
  assert.equal(call.url, "https://analytics.example.test/chat");
  assert.equal(call.init?.method, "POST");
  const headers = new Headers(call.init?.headers);
  assert.equal(headers.get("Authorization"), "Bearer test-token");
  assert.equal(headers.get("Content-Type"), "application/json");
  assert.equal(typeof call.init?.body, "string");
  assert.deepEqual(JSON.parse(String(call.init?.body)), {
    query: "plot revenue",
    space_name: "json_generator",
    flowId: "json-flow"
  });
});

test("non-ok responses become HTTP errors", async () => {
  mockFetch("bad gateway", 502);
  await assert.rejects(client.send("chart", "plot revenue"), (error: unknown) => {
    assert.ok(isHttpError(error));
    assert.equal(error.status, 502);
    assert.equal(error.body, "bad gateway");
    return true;
  });
});

test("network failures keep their message", async () => {
  globalThis.fetch = async () => {
    throw new TypeError("fetch failed");
  };
  await assert.rejects(client.send("chart", "plot revenue"), (error: unknown) => {
    assert.ok(isHttpError(error));
    assert.equal(error.status, undefined);
    assert.equal(error.message, "fetch failed");
    return true;
  });
});

test("unknown destinations are refused before any request", async () => {
  mockFetch("{}");
  await assert.rejects(
    client.send("nowhere", "hello"),
    /^Error: No backend target configured for destination nowhere\.$/
  );
  assert.equal(calls.length, 0);
});

test("a missing token is reported", async () => {
  mockFetch("{}");
  delete process.env.ANALYTICS_API_TOKEN;
  await assert.rejects(
    client.send("chart", "hello"),
    /Missing ANALYTICS_API_TOKEN\. Required for the analytics backend\./
  );
});

test("unwraps a document carried in a string member", () => {
  const inner = '{"status":"success","data":[{"a":1}]}';
  const body = JSON.stringify({ response: "```json\n" + inner + "\n```" });
  assert.equal(unwrapEnvelope(body), inner);
  assert.equal(unwrapEnvelope(inner), inner);
  assert.equal(unwrapEnvelope('{"response":"plain words"}'), '{"response":"plain words"}');
  assert.equal(unwrapEnvelope('{"data":[{"a'), '{"data":[{"a');
});

test("extracts the answer text from general responses", () => {
  assert.equal(extractAnswerText('{"response":"A warehouse stores data."}'), "A warehouse stores data.");
  assert.equal(extractAnswerText('{"data":{"answer":"Nested answer"}}'), "Nested answer");
  assert.equal(extractAnswerText('{"response":"{\\"message\\":\\"Inner\\"}"}'), "Inner");
  assert.equal(extractAnswerText("  plain text  "), "plain text");
  assert.equal(extractAnswerText('"quoted"'), "quoted");
  assert.equal(extractAnswerText('{"status":"ok"}'), null);
  assert.equal(extractAnswerText("   "), null);
});
