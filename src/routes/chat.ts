import type { Request, Response } from "express";
import { z } from "zod";
import type { ChatResponse } from "../types.js";
import type { AnalyticsClient } from "../services/analytics.js";
import { extractAnswerText } from "../services/analytics.js";
import { buildAnswer } from "../services/answer.js";
import type { ResponsePipeline } from "../services/pipeline.js";
import { tableColumns } from "../services/pipeline.js";
import type { AppConfig, DestinationConfig } from "../utils/config.js";
import { isHttpError } from "../utils/http.js";
import type { IntentRouter } from "../utils/intent.js";

export type ChatDeps = {
  config: AppConfig;
  router: IntentRouter;
  pipeline: ResponsePipeline;
  analytics: AnalyticsClient;
};

const MAX_MESSAGE_LENGTH = 4_000;

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1).max(MAX_MESSAGE_LENGTH)
});

export const ParseRequestSchema = z.object({
  raw: z.string(),
  chart: z.boolean().default(true)
});

export const RouteRequestSchema = z.object({
  utterance: z.string().trim().min(1).max(MAX_MESSAGE_LENGTH)
});

function describeFailure(error: unknown): string {
  if (isHttpError(error)) {
    return error.status
      ? `The analytics service answered with status ${error.status}.`
      : `The analytics service could not be reached (${error.message}).`;
  }
  return error instanceof Error ? error.message : "Unknown error";
}

function findDestination(config: AppConfig, id: string): DestinationConfig | undefined {
  return config.routing.destinations.find((entry) => entry.id === id);
}

export async function buildChatResponse(
  message: string,
  deps: ChatDeps
): Promise<ChatResponse> {
  const decision = deps.router.route(message);
  const destination = findDestination(deps.config, decision.destination);
  const destinationLabel = destination?.label ?? "General assistant";
  console.info(
    `[router] ${decision.destination} (${decision.matchedSignals.join(", ") || "no signals"})`
  );
  const routing = {
    matchedSignals: [...decision.matchedSignals],
    confidence: decision.confidence,
    reason: decision.reason
  };

  let body: string;
  try {
    body = await deps.analytics.send(decision.destination, message);
  } catch (error) {
    console.error("[chat] backend call failed:", error);
    return {
      destination: decision.destination,
      routing,
      answer_md: buildAnswer({
        destinationLabel,
        text: `Error: ${describeFailure(error)}`
      }),
      cards: {},
      timestamp: new Date().toISOString()
    };
  }

  const wantsChart = destination?.output === "chart";
  const result = deps.pipeline.process(body, { requireChart: wantsChart });
  if (!destination && result.outcome.kind === "fieldNotFound") {
    return {
      destination: decision.destination,
      routing,
      answer_md: buildAnswer({ destinationLabel, text: extractAnswerText(body) }),
      cards: {},
      timestamp: new Date().toISOString()
    };
  }

  const cards: ChatResponse["cards"] = {};
  if (result.chart?.ok) {
    cards.chart = result.chart.chart;
  }
  if (result.outcome.kind === "recovered" && (!wantsChart || !cards.chart)) {
    const rows = result.outcome.payload.records;
    if (rows.length) {
      cards.table = { columns: tableColumns(rows), rows };
    }
  }

  return {
    destination: decision.destination,
    routing,
    answer_md: buildAnswer({ destinationLabel, result }),
    cards,
    completeness: result.completeness,
    timestamp: new Date().toISOString()
  };
}

export function createChatHandlers(deps: ChatDeps) {
  async function postChat(req: Request, res: Response) {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Body must carry a non-empty message." });
      return;
    }
    const response = await buildChatResponse(parsed.data.message, deps);
    res.status(200).json(response);
  }

  function postParse(req: Request, res: Response) {
    const parsed = ParseRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Body must carry the raw response text." });
      return;
    }
    const result = deps.pipeline.process(parsed.data.raw, {
      requireChart: parsed.data.chart
    });
    res.status(200).json(result);
  }

  function postRoute(req: Request, res: Response) {
    const parsed = RouteRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Body must carry a non-empty utterance." });
      return;
    }
    res.status(200).json(deps.router.route(parsed.data.utterance));
  }

  return { postChat, postParse, postRoute };
}
