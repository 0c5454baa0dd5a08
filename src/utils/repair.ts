import { resolveBindings, type ShapeAliases } from "../charts/shapes.js";
import type {
  AxisBindings,
  DataRecord,
  JsonObject,
  RecoveredPayload,
  RecoveryMethod,
  RecoveryOutcome
} from "../types.js";
import { DEFAULT_CHART_CONFIG } from "./config.js";
import {
  isJsonObject,
  skipWhitespace,
  toDataRecord,
  tryParse,
  walkObject
} from "./jsonScan.js";
import { extractRecords } from "./recordExtractor.js";

export type RepairOptions = {
  dataField?: string;
  aliases?: ShapeAliases;
};

type RecoveryFacts = {
  metadata: JsonObject;
  records: DataRecord[];
  truncationDetected: boolean;
  recoveryMethod: RecoveryMethod;
  droppedFields: string[];
};

export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("```")) {
    return trimmed;
  }
  return trimmed
    .replace(/^```[\w-]*[^\S\n]*\n?/, "")
    .replace(/\n?```\s*$/, "")
    .trim();
}

function readStatus(metadata: JsonObject): string | undefined {
  return typeof metadata.status === "string" ? metadata.status : undefined;
}

function buildPayload(facts: RecoveryFacts, aliases: ShapeAliases): RecoveredPayload {
  const shape = resolveBindings(facts.metadata, aliases);
  const axisBindings: AxisBindings = {};
  if (shape.x !== undefined) {
    axisBindings.x = shape.x;
  }
  if (shape.y !== undefined) {
    axisBindings.y = shape.y;
  }

  const payload: RecoveredPayload = {
    records: facts.records,
    axisBindings,
    recordCount: facts.records.length,
    isComplete: !facts.truncationDetected,
    recoveryMethod: facts.recoveryMethod,
    metadata: facts.metadata,
    droppedFields: facts.droppedFields
  };
  const status = readStatus(facts.metadata);
  if (status !== undefined) {
    payload.status = status;
  }
  if (shape.chartKind !== undefined) {
    payload.chartKind = shape.chartKind;
  }
  if (shape.color !== undefined) {
    payload.colorBinding = shape.color;
  }
  return payload;
}

function withoutField(source: JsonObject, field: string): JsonObject {
  const copy: JsonObject = {};
  for (const [key, value] of Object.entries(source)) {
    if (key !== field) {
      copy[key] = value;
    }
  }
  return copy;
}

function salvageMetadata(
  text: string,
  field: string
): { metadata: JsonObject; droppedFields: string[] } {
  const metadata: JsonObject = {};
  const droppedFields: string[] = [];
  const objectStart = skipWhitespace(text, 0);
  if (text[objectStart] !== "{") {
    return { metadata, droppedFields };
  }

  const walk = walkObject(text, objectStart);
  for (const member of walk.members) {
    if (member.key === field) {
      continue;
    }
    const value = tryParse(text.slice(member.valueStart, member.valueEnd));
    if (value === undefined) {
      droppedFields.push(member.key);
      continue;
    }
    metadata[member.key] = value;
  }
  if (walk.cut && walk.cut.key !== field) {
    droppedFields.push(walk.cut.key);
  }
  return { metadata, droppedFields };
}

/**
 * Turns a possibly cut-off response body into a valid payload holding every
 * complete record and metadata member. Never throws; a body without the data
 * array yields `fieldNotFound` with whatever metadata survived.
 */
export function recoverPayload(
  raw: string,
  options: RepairOptions = {}
): RecoveryOutcome {
  const field = options.dataField ?? DEFAULT_CHART_CONFIG.dataField;
  const aliases = options.aliases ?? DEFAULT_CHART_CONFIG.aliases;
  const text = stripCodeFence(raw);

  const direct = tryParse(text);
  if (isJsonObject(direct)) {
    const data = direct[field];
    if (Array.isArray(data)) {
      const payload = buildPayload(
        {
          metadata: withoutField(direct, field),
          records: data.filter(isJsonObject).map(toDataRecord),
          truncationDetected: false,
          recoveryMethod: "none",
          droppedFields: []
        },
        aliases
      );
      return { kind: "recovered", payload };
    }
  }

  const { metadata, droppedFields } = salvageMetadata(text, field);
  const extraction = extractRecords(text, field);
  if (!extraction.found) {
    return {
      kind: "fieldNotFound",
      field,
      status: readStatus(metadata),
      metadata
    };
  }

  const recoveryMethod: RecoveryMethod = extraction.truncationDetected
    ? "records-salvaged"
    : "metadata-trimmed";
  const payload = buildPayload(
    {
      metadata,
      records: extraction.records,
      truncationDetected: extraction.truncationDetected,
      recoveryMethod,
      droppedFields
    },
    aliases
  );
  console.info(
    `[repair] ${recoveryMethod}: kept ${payload.recordCount} records` +
      (droppedFields.length ? `, dropped ${droppedFields.join(", ")}` : "")
  );
  return { kind: "recovered", payload };
}
