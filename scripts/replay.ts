import { readFile } from "node:fs/promises";
import dotenv from "dotenv";
import {
  createResponsePipeline,
  type ResponsePipeline
} from "../src/services/pipeline.js";
import { loadConfig } from "../src/utils/config.js";

dotenv.config();

type ReplayResult = {
  file: string;
  ok: boolean;
  details: string;
};

async function replay(
  file: string,
  pipeline: ResponsePipeline
): Promise<ReplayResult> {
  const raw = await readFile(file, "utf-8");
  const result = pipeline.process(raw, { requireChart: true });
  if (result.outcome.kind === "fieldNotFound") {
    return { file, ok: false, details: `no "${result.outcome.field}" array` };
  }
  const { completeness, chart } = result;
  const parts = [
    `${completeness.recordCount} records`,
    completeness.isComplete ? "complete" : "truncated",
    completeness.recoveryMethod
  ];
  if (chart?.ok) {
    parts.push(`${chart.chart.kind} "${chart.chart.title}" (${chart.chart.rows.length} rows)`);
  } else if (chart) {
    parts.push(`${chart.error.code}: ${chart.error.message}`);
  }
  return { file, ok: chart?.ok ?? false, details: parts.join(", ") };
}

async function main() {
  const files = process.argv.slice(2);
  if (!files.length) {
    console.error("Usage: npm run replay -- <response-file> [...]");
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const pipeline = createResponsePipeline(config.charts);
  const results = await Promise.all(files.map((file) => replay(file, pipeline)));

  for (const result of results) {
    console.log(`${result.ok ? "OK" : "FAIL"} - ${result.file}: ${result.details}`);
  }
  if (results.some((result) => !result.ok)) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Unexpected error: ${message}`);
  process.exitCode = 1;
});
