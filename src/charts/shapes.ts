import type { ChartKind, JsonObject, JsonValue } from "../types.js";

export type ShapeAliases = {
  kind: string[];
  x: string[];
  y: string[];
  color: string[];
};

export type YShape = "single" | "many" | "ohlc";

export type KindShape = {
  kind: ChartKind;
  names: string[];
  y: YShape;
};

/**
 * Chart kinds and the y-binding shape each one needs. `names` are matched
 * against the lower-cased kind string after separators are collapsed.
 */
export const KIND_SHAPES: Readonly<Record<ChartKind, KindShape>> = {
  candlestick: { kind: "candlestick", names: ["candlestick", "candle", "candles", "ohlc"], y: "ohlc" },
  pie: { kind: "pie", names: ["pie", "donut", "doughnut"], y: "single" },
  scatter: { kind: "scatter", names: ["scatter", "scatterplot", "bubble"], y: "many" },
  line: { kind: "line", names: ["line", "area", "timeseries", "time series"], y: "many" },
  bar: { kind: "bar", names: ["bar", "column", "histogram", "stacked bar"], y: "many" }
};

const SHAPE_LIST = Object.values(KIND_SHAPES);

export const OHLC_NAMES = ["open", "high", "low", "close"] as const;

const KIND_NOISE = /\b(chart|plot|graph)\b/g;

export function resolveKind(raw: string): KindShape | null {
  const cleaned = raw
    .toLowerCase()
    .replace(/[_-]+/g, " ")
    .replace(KIND_NOISE, " ")
    .replace(/\s+/g, " ")
    .trim();
  if (!cleaned) {
    return null;
  }
  const exact = SHAPE_LIST.find((shape) => shape.names.includes(cleaned));
  if (exact) {
    return exact;
  }
  const words = cleaned.split(" ");
  return (
    SHAPE_LIST.find((shape) =>
      shape.names.some((name) => words.includes(name))
    ) ?? null
  );
}

function firstValue(
  metadata: JsonObject,
  aliases: string[],
  accept: (value: JsonValue) => boolean
): JsonValue | undefined {
  for (const alias of aliases) {
    const value = metadata[alias];
    if (value !== undefined && accept(value)) {
      return value;
    }
  }
  return undefined;
}

function isFieldList(value: JsonValue): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item) => typeof item === "string")
  );
}

function asBinding(value: JsonValue | undefined): string | string[] | undefined {
  if (typeof value === "string" && value.trim()) {
    return value;
  }
  if (value !== undefined && isFieldList(value)) {
    return value;
  }
  return undefined;
}

export type ResolvedShape = {
  chartKind?: string;
  x?: string | string[];
  y?: string | string[];
  color?: string;
};

/** Reads kind, axis and color bindings from whichever alias the payload used. */
export function resolveBindings(
  metadata: JsonObject,
  aliases: ShapeAliases
): ResolvedShape {
  const isString = (value: JsonValue) => typeof value === "string";
  const isBinding = (value: JsonValue) => asBinding(value) !== undefined;

  const kind = firstValue(metadata, aliases.kind, isString);
  const color = firstValue(metadata, aliases.color, isString);

  return {
    chartKind: typeof kind === "string" ? kind : undefined,
    x: asBinding(firstValue(metadata, aliases.x, isBinding)),
    y: asBinding(firstValue(metadata, aliases.y, isBinding)),
    color: typeof color === "string" && color.trim() ? color : undefined
  };
}
