import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import test from "node:test";
import type { RecoveredPayload, RecoveryOutcome } from "../src/types.js";
import { recoverPayload, stripCodeFence } from "../src/utils/repair.js";

function recovered(outcome: RecoveryOutcome): RecoveredPayload {
  assert.equal(outcome.kind, "recovered");
  if (outcome.kind !== "recovered") {
    throw new Error("expected a recovered payload");
  }
  return outcome.payload;
}

test("recoverPayload leaves a complete payload untouched", () => {
  const text = JSON.stringify({
    status: "success",
    chart_type: "line",
    x: "Date",
    y: "Close",
    data: [
      { Date: "2024-01-02", Close: 10.5 },
      { Date: "2024-01-03", Close: 11 }
    ]
  });
  const payload = recovered(recoverPayload(text));
  assert.equal(payload.isComplete, true);
  assert.equal(payload.recoveryMethod, "none");
  assert.deepEqual(payload.records, JSON.parse(text).data);
  assert.equal(payload.status, "success");
  assert.equal(payload.chartKind, "line");
  assert.deepEqual(payload.axisBindings, { x: "Date", y: "Close" });
});

test("recoverPayload salvages the complete records of a cut array", () => {
  const payload = recovered(
    recoverPayload('{"data": [{"a":1,"b":2},{"a":3,"b":4},{"a":5,"b"')
  );
  assert.equal(payload.recordCount, 2);
  assert.equal(payload.isComplete, false);
  assert.equal(payload.recoveryMethod, "records-salvaged");
});

test("recoverPayload reports an empty array as complete", () => {
  const payload = recovered(recoverPayload('{"data": []}'));
  assert.equal(payload.recordCount, 0);
  assert.equal(payload.isComplete, true);
  assert.deepEqual(payload.records, []);
});

test("recoverPayload keeps metadata that precedes a cut array", () => {
  const payload = recovered(
    recoverPayload(
      '{"status": "success", "chart_type": "scatter", "x": "Date", "y": ["Open", "Close"], "data": [{"Date": "2024-01-02", "Open": 1.5, "Close": 2}, {"Date": "2024-01-03", "Op'
    )
  );
  assert.equal(payload.status, "success");
  assert.equal(payload.chartKind, "scatter");
  assert.deepEqual(payload.axisBindings, { x: "Date", y: ["Open", "Close"] });
  assert.deepEqual(payload.records, [{ Date: "2024-01-02", Open: 1.5, Close: 2 }]);
});

test("recoverPayload drops cut metadata and reports a missing array", () => {
  const outcome = recoverPayload('{"status": "success", "chart_type": "li');
  assert.equal(outcome.kind, "fieldNotFound");
  if (outcome.kind === "fieldNotFound") {
    assert.equal(outcome.field, "data");
    assert.equal(outcome.status, "success");
    assert.deepEqual(outcome.metadata, { status: "success" });
  }
});

test("recoverPayload takes no metadata from a top-level array", () => {
  const outcome = recoverPayload('[{"a":1},{"a":2}]');
  assert.equal(outcome.kind, "fieldNotFound");
  if (outcome.kind !== "fieldNotFound") {
    return;
  }
  assert.deepEqual(outcome.metadata, {});
  assert.equal(outcome.status, undefined);
});

test("recoverPayload keeps members after a closed array", () => {
  const payload = recovered(
    recoverPayload('{"data": [{"a": 1}], "x": "a", "y": "b", "note": "trail')
  );
  assert.equal(payload.isComplete, true);
  assert.equal(payload.recoveryMethod, "metadata-trimmed");
  assert.deepEqual(payload.axisBindings, { x: "a", y: "b" });
  assert.deepEqual(payload.droppedFields, ["note"]);
});

test("recoverPayload resolves singular and plural binding aliases", () => {
  const payload = recovered(
    recoverPayload(
      '{"chartType": "bar", "x_column": "Region", "y_columns": ["Sales", "Units"], "colour": "Segment", "data": []}'
    )
  );
  assert.equal(payload.chartKind, "bar");
  assert.deepEqual(payload.axisBindings, { x: "Region", y: ["Sales", "Units"] });
  assert.equal(payload.colorBinding, "Segment");
});

test("stripCodeFence unwraps fenced documents", () => {
  assert.equal(stripCodeFence('```json\n{"data": []}\n```'), '{"data": []}');
  assert.equal(stripCodeFence('  {"data": []} '), '{"data": []}');
  const payload = recovered(recoverPayload('```json\n{"data": [{"a": 1}]}\n```'));
  assert.equal(payload.recoveryMethod, "none");
  assert.equal(payload.recordCount, 1);
});

test("recoverPayload reads a cut, fenced capture", () => {
  const raw = readFileSync(
    new URL("./fixtures/truncated-candlestick.txt", import.meta.url),
    "utf-8"
  );
  const payload = recovered(recoverPayload(raw));
  assert.equal(payload.recordCount, 3);
  assert.equal(payload.isComplete, false);
  assert.equal(payload.chartKind, "candlestick");
  assert.equal(payload.metadata.title, "Daily prices");
  assert.deepEqual(payload.axisBindings.y, ["Open", "High", "Low", "Close"]);
});

test("recoverPayload never fails and never loses a complete record at any cut", () => {
  const rows = [1, 2, 3, 4, 5].map((day) => ({
    Date: `2024-01-0${day}`,
    Close: day * 10 + 0.5,
    label: `a}b{${day}`
  }));
  const full = JSON.stringify({
    status: "success",
    chart_type: "line",
    x: "Date",
    y: "Close",
    data: rows
  });
  const recordEnds = rows.map((row) => {
    const serialized = JSON.stringify(row);
    return full.indexOf(serialized) + serialized.length;
  });

  let previous = 0;
  for (let cut = 0; cut <= full.length; cut += 1) {
    const outcome = recoverPayload(full.slice(0, cut));
    const count = outcome.kind === "recovered" ? outcome.payload.recordCount : 0;
    const expected = recordEnds.filter((end) => end <= cut).length;

    assert.equal(count, expected, `cut at ${cut}`);
    assert.ok(count >= previous, `fewer records at cut ${cut}`);
    previous = count;

    if (outcome.kind === "recovered") {
      const { payload } = outcome;
      assert.equal(payload.recordCount, payload.records.length);
      assert.deepEqual(JSON.parse(JSON.stringify(payload)), payload);
      assert.deepEqual(payload.records, rows.slice(0, count));
    }
  }
  assert.equal(previous, rows.length);
});
