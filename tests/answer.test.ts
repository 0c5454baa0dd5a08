import assert from "node:assert/strict";
import test from "node:test";
import { buildAnswer, cleanErrorMessage } from "../src/services/answer.js";
import { createResponsePipeline } from "../src/services/pipeline.js";
import { DEFAULT_CHART_CONFIG } from "../src/utils/config.js";

const pipeline = createResponsePipeline(DEFAULT_CHART_CONFIG);

test("backend error text is shortened for display", () => {
  assert.equal(
    cleanErrorMessage("[DIVIDE_BY_ZERO] Division by zero. SQLSTATE: 22012"),
    "Division by zero."
  );
  assert.equal(
    cleanErrorMessage("[TABLE_OR_VIEW_NOT_FOUND] The table `sales` cannot be found."),
    "Requested data table was not found in the database."
  );
  assert.equal(
    cleanErrorMessage("Dataset daily_prices cannot be found"),
    "The requested data source cannot be found. Check the name and date range."
  );
  assert.equal(cleanErrorMessage("Failed to run query\n  at step 3"), "Failed to run query");
  assert.equal(cleanErrorMessage("x".repeat(250)), `${"x".repeat(200)}...`);
  assert.equal(cleanErrorMessage("  "), "An error occurred while processing the request.");
});

test("a truncated chart payload is summarized with its recovery", () => {
  const raw =
    '{"status":"success","chart_type":"bar","x":"Region","y":"Sales","data":[' +
    '{"Region":"North","Sales":120},{"Region":"South","Sales":95},{"Region":"Ea';
  const result = pipeline.process(raw, { requireChart: true });

  assert.equal(
    buildAnswer({ destinationLabel: "Visualization", result }),
    [
      'Built a bar chart "Sales by Region" from 2 records.',
      "",
      "**Key stats**",
      "- Records: 2",
      "- X axis: Region",
      "- Y axis: Sales",
      "- Recovery: records-salvaged",
      "",
      "Data truncated: showing 2 complete records.",
      "",
      "Answered by: Visualization"
    ].join("\n")
  );
});

test("error payloads answer with the cleaned error", () => {
  const result = pipeline.process(
    '{"status":"error","error":"[DIVIDE_BY_ZERO] Division by zero. SQLSTATE: 22012","data":[]}',
    { requireChart: false }
  );
  assert.equal(result.chart, undefined);
  assert.equal(
    buildAnswer({ destinationLabel: "Data table", result }),
    "Error: Division by zero.\n\nAnswered by: Data table"
  );
});

test("a cut error body without data still reports the error", () => {
  const result = pipeline.process('{"status":"error","message":"Failed to run query\\nstack"', {
    requireChart: true
  });
  assert.equal(result.outcome.kind, "fieldNotFound");
  assert.equal(
    buildAnswer({ destinationLabel: "Data table", result }),
    "Error: Failed to run query\n\nAnswered by: Data table"
  );
});

test("chart warnings are listed as notes", () => {
  const result = pipeline.process(
    '{"chart_type":"pie","x":"Region","y":["Sales","Units"],"data":[{"Region":"North","Sales":3,"Units":1}]}',
    { requireChart: true }
  );
  assert.equal(
    buildAnswer({ destinationLabel: "Visualization", result }),
    [
      'Built a pie chart "Distribution of Sales" from 1 records.',
      "",
      "**Key stats**",
      "- Records: 1",
      "- X axis: Region",
      "- Y axis: Sales",
      "- Recovery: none",
      "",
      "**Notes**",
      '- Pie charts take one value field; using "Sales".',
      "",
      "Answered by: Visualization"
    ].join("\n")
  );
});

test("text answers carry notes and the destination", () => {
  assert.equal(
    buildAnswer({ destinationLabel: "General assistant", text: "  A warehouse stores data. " }),
    "A warehouse stores data.\n\nAnswered by: General assistant"
  );
  assert.equal(
    buildAnswer({ destinationLabel: "General assistant", text: "Hi", notes: ["Cached"] }),
    "Hi\n\n**Notes**\n- Cached\n\nAnswered by: General assistant"
  );
  assert.equal(
    buildAnswer({ destinationLabel: "General assistant", text: null }),
    "No answer was returned.\n\nAnswered by: General assistant"
  );
});
