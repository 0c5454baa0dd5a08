import type {
  ChartColor,
  ChartDescription,
  ChartErrorCode,
  ChartKind,
  DataRecord,
  NormalizeResult,
  OhlcFields,
  RecoveredPayload
} from "../types.js";
import { KIND_SHAPES, OHLC_NAMES, resolveKind, type KindShape } from "./shapes.js";

export type NormalizerConfig = {
  xCandidates: string[];
};

export type ChartNormalizer = {
  normalize(payload: RecoveredPayload): NormalizeResult;
};

const ABBREVIATIONS = new Set(["id", "url", "api", "sql", "usd", "ohlc"]);

function reject(code: ChartErrorCode, message: string): NormalizeResult {
  return { ok: false, error: { code, message } };
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function hasValue(row: DataRecord, field: string): boolean {
  return Object.hasOwn(row, field) && row[field] !== null;
}

function numericFields(record: DataRecord, exclude: string): string[] {
  return Object.keys(record).filter(
    (key) =>
      key !== exclude &&
      key.toLowerCase() !== "date" &&
      isNumber(record[key])
  );
}

function matchOhlc(fields: string[]): OhlcFields | null {
  const [open, high, low, close] = OHLC_NAMES.map((name) =>
    fields.find((field) => field.toLowerCase() === name)
  );
  if (!open || !high || !low || !close) {
    return null;
  }
  return { open, high, low, close };
}

function toList(binding: string | string[] | undefined): string[] {
  if (binding === undefined) {
    return [];
  }
  return typeof binding === "string" ? [binding] : binding;
}

export function formatColumnName(column: string): string {
  const words = column.replace(/[_-]+/g, " ").split(/\s+/).filter(Boolean);
  if (!words.length) {
    return "Value";
  }
  return words
    .map((word) =>
      ABBREVIATIONS.has(word.toLowerCase())
        ? word.toUpperCase()
        : word.charAt(0).toUpperCase() + word.slice(1)
    )
    .join(" ");
}

export function buildChartTitle(
  kind: ChartKind,
  xField: string,
  yFields: string[]
): string {
  const x = formatColumnName(xField);
  const y = yFields.map(formatColumnName).join(" & ") || "Value";
  switch (kind) {
    case "bar":
      return `${y} by ${x}`;
    case "pie":
      return `Distribution of ${y}`;
    case "line":
      return `${y} over ${x}`;
    case "scatter":
      return `${y} vs ${x}`;
    case "candlestick":
      return "OHLC Price Chart";
  }
}

function detectKind(sample: DataRecord): KindShape {
  if (matchOhlc(Object.keys(sample))) {
    return KIND_SHAPES.candlestick;
  }
  if (numericFields(sample, "").length >= 2) {
    return KIND_SHAPES.scatter;
  }
  return KIND_SHAPES.line;
}

function detectX(sample: DataRecord, candidates: string[]): string | undefined {
  return candidates.find((candidate) => Object.hasOwn(sample, candidate)) ??
    Object.keys(sample)[0];
}

function detectY(sample: DataRecord, xField: string, shape: KindShape): string[] {
  const numeric = numericFields(sample, xField);
  if (shape.y === "ohlc") {
    const ohlc = matchOhlc(Object.keys(sample));
    return ohlc ? [ohlc.open, ohlc.high, ohlc.low, ohlc.close] : numeric;
  }
  if (shape.kind === "scatter") {
    return numeric.slice(0, 2);
  }
  return numeric.slice(0, 1);
}

function resolveColor(
  binding: string | undefined,
  rows: DataRecord[],
  kind: ChartKind,
  xField: string,
  warnings: string[]
): ChartColor | undefined {
  if (!binding) {
    return undefined;
  }
  if (kind === "pie" && binding === xField) {
    return undefined;
  }
  const holders = rows.filter((row) => Object.hasOwn(row, binding)).length;
  if (holders === rows.length) {
    return { type: "field", field: binding };
  }
  if (holders === 0) {
    return { type: "literal", value: binding };
  }
  warnings.push(`Color field "${binding}" is missing from some rows; ignored.`);
  return undefined;
}

/**
 * Builds the normalizer used for every payload. Kind, axis and color
 * bindings arrive already resolved through the alias table; this step checks
 * each kind's required shape, fills missing bindings from the first record
 * and drops rows that lack the x field or hold a non-numeric y value.
 */
export function createChartNormalizer(config: NormalizerConfig): ChartNormalizer {
  function normalize(payload: RecoveredPayload): NormalizeResult {
    const records = payload.records;
    const declared = payload.chartKind === undefined ? null : resolveKind(payload.chartKind);
    if (payload.chartKind !== undefined && !declared) {
      return reject(
        "UnsupportedChartKind",
        `Unsupported chart kind "${payload.chartKind}". Expected one of: ${Object.keys(KIND_SHAPES).join(", ")}.`
      );
    }
    const sample = records[0];
    if (!sample) {
      return reject("InsufficientFields", "No records to chart.");
    }
    const shape: KindShape = declared ?? detectKind(sample);

    const warnings: string[] = [];
    const declaredX = toList(payload.axisBindings.x);
    if (declaredX.length > 1) {
      warnings.push(`Multiple x fields given; using "${declaredX[0]}".`);
    }
    const xField = declaredX[0] ?? detectX(sample, config.xCandidates);
    if (!xField) {
      return reject("InsufficientFields", "No field available for the x axis.");
    }

    const declaredY = toList(payload.axisBindings.y);
    const candidatesY = declaredY.length ? declaredY : detectY(sample, xField, shape);

    let kind: ChartKind = shape.kind;
    let yFields: string[];
    let ohlc: OhlcFields | undefined;

    if (shape.y === "ohlc") {
      const matched = matchOhlc(candidatesY);
      if (matched) {
        ohlc = matched;
        yFields = [matched.open, matched.high, matched.low, matched.close];
      } else {
        const fallback =
          candidatesY.find((field) => records.some((row) => isNumber(row[field]))) ??
          numericFields(sample, xField)[0];
        if (!fallback) {
          return reject(
            "InsufficientFields",
            "Candlestick charts need Open, High, Low and Close fields."
          );
        }
        kind = "line";
        yFields = [fallback];
        warnings.push(
          `Candlestick needs Open, High, Low and Close; drawn as a line of "${fallback}".`
        );
      }
    } else if (shape.y === "single") {
      const values = candidatesY.filter((field) => field !== xField);
      if (values.length > 1) {
        warnings.push(`Pie charts take one value field; using "${values[0]}".`);
      }
      yFields = values.slice(0, 1);
    } else {
      yFields = candidatesY;
    }

    if (!yFields.length) {
      return reject("InsufficientFields", `No numeric field available for a ${kind} chart.`);
    }

    const required = [xField, ...yFields];
    const rows = records.filter(
      (row) => hasValue(row, xField) && yFields.every((field) => isNumber(row[field]))
    );
    if (!rows.length) {
      const missing = required.filter((field) => !records.some((row) => hasValue(row, field)));
      const nonNumeric = yFields.filter((field) => !records.some((row) => isNumber(row[field])));
      let message = "No row holds every required field.";
      if (missing.length) {
        message = `No usable rows: missing ${missing.join(", ")}.`;
      } else if (nonNumeric.length) {
        message = `No usable rows: ${nonNumeric.join(", ")} ${nonNumeric.length > 1 ? "have" : "has"} no numeric values.`;
      }
      return reject("InsufficientFields", message);
    }
    if (rows.length < records.length) {
      warnings.push(
        `Dropped ${records.length - rows.length} rows with missing or non-numeric values.`
      );
    }

    const color = resolveColor(payload.colorBinding, rows, kind, xField, warnings);
    const title =
      typeof payload.metadata.title === "string" && payload.metadata.title.trim()
        ? payload.metadata.title.trim()
        : buildChartTitle(kind, xField, yFields);

    const chart: ChartDescription = {
      kind,
      title,
      rows,
      xField,
      yFields,
      series: ohlc
        ? [{ name: "OHLC", yField: ohlc.close }]
        : yFields.map((yField) => ({ name: formatColumnName(yField), yField }))
    };
    if (color) {
      chart.color = color;
    }
    if (ohlc) {
      chart.ohlc = ohlc;
    }
    return { ok: true, chart, warnings };
  }

  return { normalize };
}
