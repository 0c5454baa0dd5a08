import type { BackendTarget } from "../utils/config.js";
import { getAnalyticsConfig } from "../utils/env.js";
import { fetchText } from "../utils/http.js";
import { isJsonObject, tryParse } from "../utils/jsonScan.js";
import { stripCodeFence } from "../utils/repair.js";

export type AnalyticsClient = {
  send(destination: string, query: string): Promise<string>;
};

const ENVELOPE_FIELDS = ["response", "message", "content", "result", "data"];

const ANSWER_FIELDS = [
  "response",
  "message",
  "text",
  "content",
  "answer",
  "result",
  "output",
  "reply",
  "description"
];

export function createAnalyticsClient(
  backend: Record<string, BackendTarget>
): AnalyticsClient {
  async function send(destination: string, query: string): Promise<string> {
    const target = backend[destination];
    if (!target) {
      throw new Error(`No backend target configured for destination ${destination}.`);
    }
    const { apiKey, baseUrl, timeoutMs } = getAnalyticsConfig();
    console.info(`[analytics] ${destination}: ${query.slice(0, 100)}`);
    const body = await fetchText(baseUrl, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        query,
        space_name: target.spaceName,
        flowId: target.flowId
      }),
      timeoutMs
    });
    console.info(`[analytics] ${destination} answered with ${body.length} chars`);
    return body;
  }

  return { send };
}

/**
 * The chat service often wraps the generated document in a string member
 * (`{"response": "{\"status\": ...}"}`). Returns that inner document when
 * present, otherwise the body unchanged.
 */
export function unwrapEnvelope(body: string, dataField = "data"): string {
  const parsed = tryParse(body.trim());
  if (!isJsonObject(parsed) || Array.isArray(parsed[dataField])) {
    return body;
  }
  for (const field of ENVELOPE_FIELDS) {
    const value = parsed[field];
    if (typeof value !== "string") {
      continue;
    }
    const inner = stripCodeFence(value);
    if (inner.startsWith("{")) {
      return inner;
    }
  }
  return body;
}

/** Pulls the human-readable answer out of a general (non-chart) response. */
export function extractAnswerText(body: string): string | null {
  const trimmed = body.trim();
  if (!trimmed) {
    return null;
  }
  const parsed = tryParse(trimmed);
  if (!isJsonObject(parsed)) {
    return typeof parsed === "string" ? parsed.trim() || null : trimmed;
  }

  const nested = parsed.data;
  const scopes = isJsonObject(nested) ? [parsed, nested] : [parsed];
  for (const scope of scopes) {
    for (const field of ANSWER_FIELDS) {
      const value = scope[field];
      if (typeof value !== "string" || !value.trim()) {
        continue;
      }
      const inner = tryParse(value.trim());
      if (isJsonObject(inner)) {
        const extracted = extractAnswerText(value);
        if (extracted) {
          return extracted;
        }
        continue;
      }
      return value.trim();
    }
  }
  return null;
}
