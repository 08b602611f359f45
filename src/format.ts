import { CliError } from "./errors";
import type { JsonRecord, ListDisplay } from "./types";

export const NO_RESULTS = "No results.";

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function fmtValue(val: unknown): string | null {
  if (val === undefined || val === null || val === "") return null;
  if (typeof val === "string") return val;
  if (typeof val === "number" || typeof val === "boolean" || typeof val === "bigint") return String(val);
  return JSON.stringify(val);
}

export function kvLine(key: string, val: unknown): string | null {
  const v = fmtValue(val);
  if (v === null) return null;
  return `${key}: ${v}`;
}

export function pushKv(lines: string[], key: string, val: unknown): void {
  const line = kvLine(key, val);
  if (line) lines.push(line);
}

export function recordLines(record: JsonRecord): string[] {
  const lines: string[] = [];
  for (const [key, val] of Object.entries(record)) {
    pushKv(lines, key, val);
  }
  return lines;
}

/** Accepts a JSON array of objects, a single object, or an empty body. */
export function toRecordList(value: unknown, what: string): JsonRecord[] {
  if (value === null || value === undefined) return [];
  if (isRecord(value)) return [value];
  if (Array.isArray(value)) {
    const records = value.filter(isRecord);
    if (records.length !== value.length) {
      throw new CliError("INTERNAL", `Unexpected ${what} list entry in HSS API response.`, {
        details: value
      });
    }
    return records;
  }
  throw new CliError("INTERNAL", `Unexpected ${what} response from HSS API.`, { details: value });
}

export type ListLayout = {
  keyField: (record: JsonRecord) => string;
  // fields left out of the long view because the row prefix already shows them
  keyFields: string[];
  briefFields: string[];
  idLine: (record: JsonRecord) => string;
};

export function listLines(records: JsonRecord[], display: ListDisplay, layout: ListLayout): string[] {
  if (records.length === 0) return [NO_RESULTS];

  const lines: string[] = [];
  for (const record of records) {
    const key = layout.keyField(record);
    if (display === "id") {
      lines.push(layout.idLine(record));
      continue;
    }
    const fields = display === "brief"
      ? layout.briefFields
      : Object.keys(record).filter((f) => !layout.keyFields.includes(f));
    const before = lines.length;
    for (const field of fields) {
      const line = kvLine(field, record[field]);
      if (line) lines.push(`${key}, ${line}`);
    }
    // a record with nothing to show still gets its row
    if (lines.length === before) lines.push(layout.idLine(record));
  }
  return lines;
}
