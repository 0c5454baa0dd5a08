import type { DataRecord, JsonObject, JsonValue, Scalar } from "../types.js";

export type ScanResult =
  | { status: "complete"; end: number }
  | { status: "incomplete" }
  | { status: "malformed"; at: number };

const CLOSERS: Record<string, string> = { "{": "}", "[": "]" };
const PRIMITIVE_STOP = /[\s,\]}]/;

export function skipWhitespace(text: string, index: number): number {
  let i = index;
  while (i < text.length && /\s/.test(text[i])) {
    i += 1;
  }
  return i;
}

function scanString(text: string, start: number): ScanResult {
  for (let i = start + 1; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "\\") {
      i += 1;
      continue;
    }
    if (ch === "\"") {
      return { status: "complete", end: i + 1 };
    }
  }
  return { status: "incomplete" };
}

function scanContainer(text: string, start: number): ScanResult {
  const stack: string[] = [];
  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "\"") {
      const str = scanString(text, i);
      if (str.status !== "complete") {
        return str;
      }
      i = str.end - 1;
      continue;
    }
    if (ch === "{" || ch === "[") {
      stack.push(CLOSERS[ch]);
      continue;
    }
    if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) {
        return { status: "malformed", at: i };
      }
      if (!stack.length) {
        return { status: "complete", end: i + 1 };
      }
    }
  }
  return { status: "incomplete" };
}

function scanPrimitive(text: string, start: number): ScanResult {
  for (let i = start; i < text.length; i += 1) {
    if (PRIMITIVE_STOP.test(text[i])) {
      return i === start
        ? { status: "malformed", at: i }
        : { status: "complete", end: i };
    }
  }
  // a bare number or literal at end of input may still be growing
  return { status: "incomplete" };
}

/**
 * Delimits the JSON value starting at `start` without parsing it. Depth is
 * tracked across braces and brackets, and quoted strings (with escapes) are
 * skipped so braces inside string values do not count.
 */
export function scanValue(text: string, start: number): ScanResult {
  if (start >= text.length) {
    return { status: "incomplete" };
  }
  const ch = text[start];
  if (ch === "{" || ch === "[") {
    return scanContainer(text, start);
  }
  if (ch === "\"") {
    return scanString(text, start);
  }
  return scanPrimitive(text, start);
}

export function tryParse(fragment: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(fragment);
    return value;
  } catch {
    return undefined;
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: JsonValue): value is Scalar {
  return value === null || typeof value !== "object";
}

/** Keeps the scalar members of a parsed object; nested values are not record fields. */
export function toDataRecord(value: JsonObject): DataRecord {
  const record: DataRecord = {};
  for (const [key, member] of Object.entries(value)) {
    if (isScalar(member)) {
      record[key] = member;
    }
  }
  return record;
}

export type MemberSpan = {
  key: string;
  valueStart: number;
  valueEnd: number;
};

export type ObjectWalk = {
  members: MemberSpan[];
  closed: boolean;
  end?: number;
  /** Member whose value was cut off or malformed; the walk stops there. */
  cut?: { key: string; valueStart: number };
};

/**
 * Walks the members of the object opening at `start`, delimiting each value
 * with {@link scanValue}. Stops at the first member that cannot be delimited.
 */
export function walkObject(text: string, start: number): ObjectWalk {
  const members: MemberSpan[] = [];
  let i = skipWhitespace(text, start + 1);

  while (i < text.length) {
    if (text[i] === "}") {
      return { members, closed: true, end: i + 1 };
    }
    if (text[i] !== "\"") {
      break;
    }
    const keyScan = scanValue(text, i);
    if (keyScan.status !== "complete") {
      break;
    }
    const key = tryParse(text.slice(i, keyScan.end));
    if (typeof key !== "string") {
      break;
    }
    i = skipWhitespace(text, keyScan.end);
    if (text[i] !== ":") {
      break;
    }
    const valueStart = skipWhitespace(text, i + 1);
    const valueScan = scanValue(text, valueStart);
    if (valueScan.status !== "complete") {
      return { members, closed: false, cut: { key, valueStart } };
    }
    members.push({ key, valueStart, valueEnd: valueScan.end });
    i = skipWhitespace(text, valueScan.end);
    if (text[i] === ",") {
      i = skipWhitespace(text, i + 1);
    }
  }

  return { members, closed: false };
}
