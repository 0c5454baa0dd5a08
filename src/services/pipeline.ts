import { createChartNormalizer } from "../charts/normalizer.js";
import type {
  Completeness,
  DataRecord,
  NormalizeResult,
  RecoveryOutcome
} from "../types.js";
import type { ChartConfig } from "../utils/config.js";
import { recoverPayload } from "../utils/repair.js";
import { unwrapEnvelope } from "./analytics.js";

export type PipelineResult = {
  outcome: RecoveryOutcome;
  completeness: Completeness;
  chart?: NormalizeResult;
};

export type PipelineOptions = {
  /** Normalize even when the payload names no chart kind. */
  requireChart: boolean;
};

export type ResponsePipeline = {
  process(raw: string, options: PipelineOptions): PipelineResult;
};

export function describeCompleteness(outcome: RecoveryOutcome): Completeness {
  if (outcome.kind === "fieldNotFound") {
    return { isComplete: false, recordCount: 0, recoveryMethod: "field-not-found" };
  }
  const { isComplete, recordCount, recoveryMethod } = outcome.payload;
  return { isComplete, recordCount, recoveryMethod };
}

export function tableColumns(rows: DataRecord[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

export function createResponsePipeline(config: ChartConfig): ResponsePipeline {
  const normalizer = createChartNormalizer({ xCandidates: config.xCandidates });

  function processResponse(raw: string, options: PipelineOptions): PipelineResult {
    const document = unwrapEnvelope(raw, config.dataField);
    const outcome = recoverPayload(document, {
      dataField: config.dataField,
      aliases: config.aliases
    });
    const completeness = describeCompleteness(outcome);
    if (outcome.kind === "fieldNotFound") {
      return { outcome, completeness };
    }

    const { payload } = outcome;
    const wantsChart =
      payload.status !== "error" &&
      (options.requireChart || payload.chartKind !== undefined);
    if (!wantsChart) {
      return { outcome, completeness };
    }
    const chart = normalizer.normalize(payload);
    if (!chart.ok) {
      console.warn(`[pipeline] chart rejected: ${chart.error.code} ${chart.error.message}`);
    }
    return { outcome, completeness, chart };
  }

  return { process: processResponse };
}
