import type { DataRecord } from "../types.js";
import {
  isJsonObject,
  scanValue,
  skipWhitespace,
  toDataRecord,
  tryParse,
  walkObject
} from "./jsonScan.js";

export type RecordRun = {
  records: DataRecord[];
  truncationDetected: boolean;
  /** Index just past the closing bracket, when the array closed. */
  end?: number;
};

export type ExtractionResult =
  | ({ found: true } & RecordRun)
  | { found: false };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function locateArray(raw: string, field: string): number | null {
  const objectStart = raw.indexOf("{");
  if (objectStart !== -1) {
    const walk = walkObject(raw, objectStart);
    const member =
      walk.members.find((entry) => entry.key === field) ??
      (walk.cut?.key === field ? walk.cut : undefined);
    if (member) {
      return raw[member.valueStart] === "[" ? member.valueStart : null;
    }
  }

  // nested or wrapped payloads: fall back to the first textual occurrence
  const pattern = new RegExp(`"${escapeRegExp(field)}"\\s*:\\s*\\[`);
  const match = pattern.exec(raw);
  if (!match) {
    return null;
  }
  return match.index + match[0].length - 1;
}

/**
 * Reads object elements from the array opening at `bracket` until the array
 * closes or an element cannot be delimited and parsed on its own.
 */
export function readRecordsAt(raw: string, bracket: number): RecordRun {
  const records: DataRecord[] = [];
  let i = skipWhitespace(raw, bracket + 1);

  if (raw[i] === "]") {
    return { records, truncationDetected: false, end: i + 1 };
  }

  while (i < raw.length) {
    const scan = scanValue(raw, i);
    if (scan.status !== "complete") {
      break;
    }
    const value = tryParse(raw.slice(i, scan.end));
    if (value === undefined) {
      break;
    }
    if (isJsonObject(value)) {
      records.push(toDataRecord(value));
    }

    i = skipWhitespace(raw, scan.end);
    if (raw[i] === ",") {
      i = skipWhitespace(raw, i + 1);
      if (raw[i] === "]") {
        return { records, truncationDetected: false, end: i + 1 };
      }
      continue;
    }
    if (raw[i] === "]") {
      return { records, truncationDetected: false, end: i + 1 };
    }
    break;
  }

  return { records, truncationDetected: true };
}

export function extractRecords(raw: string, field = "data"): ExtractionResult {
  const bracket = locateArray(raw, field);
  if (bracket === null) {
    return { found: false };
  }
  return { found: true, ...readRecordsAt(raw, bracket) };
}
