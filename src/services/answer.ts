import type { JsonObject } from "../types.js";
import type { PipelineResult } from "./pipeline.js";

export type AnswerContext = {
  destinationLabel: string;
  text?: string | null;
  result?: PipelineResult;
  notes?: string[];
};

const MAX_ERROR_LENGTH = 200;

/**
 * Shortens backend error text for display: SQLSTATE tails and bracketed error
 * codes are removed, missing-table errors get a plain sentence.
 */
export function cleanErrorMessage(errorText: string): string {
  const text = errorText.trim();
  if (text.includes("TABLE_OR_VIEW_NOT_FOUND")) {
    return "Requested data table was not found in the database.";
  }
  if (text.includes("SQLSTATE")) {
    const head = text
      .split("SQLSTATE")[0]
      .replace(/\[[A-Z_]+\]/g, "")
      .trim();
    if (head) {
      return head;
    }
  }
  if (text.includes("cannot be found")) {
    return "The requested data source cannot be found. Check the name and date range.";
  }
  if (text.includes("Failed to") || text.includes("Error:")) {
    return text.split("\n")[0];
  }
  if (text.length > MAX_ERROR_LENGTH) {
    return `${text.slice(0, MAX_ERROR_LENGTH)}...`;
  }
  return text || "An error occurred while processing the request.";
}

export function findErrorMessage(metadata: JsonObject): string | null {
  const error = metadata.error;
  if (typeof error === "string" && error.trim()) {
    return cleanErrorMessage(error);
  }
  if (metadata.status === "error") {
    const message = metadata.message;
    return typeof message === "string" && message.trim()
      ? cleanErrorMessage(message)
      : "The analytics service reported an error.";
  }
  return null;
}

function describeRecovery(result: PipelineResult, lines: string[]): void {
  const { outcome, chart } = result;
  if (outcome.kind === "fieldNotFound") {
    const error = findErrorMessage(outcome.metadata);
    lines.push(error ? `Error: ${error}` : "The response held no chartable data.");
    return;
  }

  const { payload } = outcome;
  const error = findErrorMessage(payload.metadata);
  if (error) {
    lines.push(`Error: ${error}`);
    return;
  }

  if (chart?.ok) {
    lines.push(
      `Built a ${chart.chart.kind} chart "${chart.chart.title}" from ${chart.chart.rows.length} records.`
    );
  } else if (payload.recordCount > 0) {
    lines.push(`Retrieved ${payload.recordCount} records.`);
  } else {
    lines.push("Query executed successfully; no records returned.");
  }

  lines.push("");
  lines.push("**Key stats**");
  lines.push(`- Records: ${payload.recordCount}`);
  if (chart?.ok) {
    lines.push(`- X axis: ${chart.chart.xField}`);
    lines.push(`- Y axis: ${chart.chart.yFields.join(", ")}`);
  }
  lines.push(`- Recovery: ${payload.recoveryMethod}`);

  if (!payload.isComplete) {
    lines.push("");
    lines.push(`Data truncated: showing ${payload.recordCount} complete records.`);
  }
  if (chart && !chart.ok) {
    lines.push("");
    lines.push(`Chart not shown (${chart.error.code}): ${chart.error.message}`);
  }
}

export function buildAnswer(context: AnswerContext): string {
  const lines: string[] = [];

  if (context.result) {
    describeRecovery(context.result, lines);
  } else {
    lines.push(context.text?.trim() || "No answer was returned.");
  }

  const notes = [
    ...(context.notes ?? []),
    ...(context.result?.chart?.ok ? context.result.chart.warnings : [])
  ];
  if (notes.length) {
    lines.push("");
    lines.push("**Notes**");
    notes.forEach((note) => {
      lines.push(`- ${note}`);
    });
  }

  lines.push("");
  lines.push(`Answered by: ${context.destinationLabel}`);
  return lines.join("\n");
}
