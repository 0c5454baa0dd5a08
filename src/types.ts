export type Scalar = string | number | boolean | null;

export type JsonValue =
  | Scalar
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type DataRecord = Record<string, Scalar>;

export type ChartKind = "bar" | "pie" | "line" | "scatter" | "candlestick";

export type RecoveryMethod = "none" | "records-salvaged" | "metadata-trimmed";

export type AxisBindings = {
  x?: string | string[];
  y?: string | string[];
};

export type RecoveredPayload = {
  status?: string;
  chartKind?: string;
  records: DataRecord[];
  axisBindings: AxisBindings;
  colorBinding?: string;
  recordCount: number;
  isComplete: boolean;
  recoveryMethod: RecoveryMethod;
  metadata: JsonObject;
  droppedFields: string[];
};

export type RecoveryOutcome =
  | { kind: "recovered"; payload: RecoveredPayload }
  | {
      kind: "fieldNotFound";
      field: string;
      status?: string;
      metadata: JsonObject;
    };

export type ChartColor =
  | { type: "field"; field: string }
  | { type: "literal"; value: string };

export type ChartSeries = {
  name: string;
  yField: string;
};

export type OhlcFields = {
  open: string;
  high: string;
  low: string;
  close: string;
};

export type ChartDescription = {
  kind: ChartKind;
  title: string;
  rows: DataRecord[];
  xField: string;
  yFields: string[];
  series: ChartSeries[];
  color?: ChartColor;
  ohlc?: OhlcFields;
};

export type ChartErrorCode = "UnsupportedChartKind" | "InsufficientFields";

export type NormalizeResult =
  | { ok: true; chart: ChartDescription; warnings: string[] }
  | { ok: false; error: { code: ChartErrorCode; message: string } };

export type RoutingDecision = Readonly<{
  destination: string;
  matchedSignals: readonly string[];
  scores: Readonly<Record<string, number>>;
  confidence: number;
  reason: string;
}>;

export type Completeness = {
  isComplete: boolean;
  recordCount: number;
  recoveryMethod: RecoveryMethod | "field-not-found";
};

export type ChatResponse = {
  destination: string;
  routing: {
    matchedSignals: string[];
    confidence: number;
    reason: string;
  };
  answer_md: string;
  cards: {
    chart?: ChartDescription;
    table?: { columns: string[]; rows: DataRecord[] };
  };
  completeness?: Completeness;
  timestamp: string;
};
