import type { CrmRecord } from "../types";

export class ResponseShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseShapeError";
  }
}

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readResults(payload: unknown, label: string): unknown[] {
  if (!isRecordLike(payload)) {
    throw new ResponseShapeError(`Invalid ${label} payload: expected an object`);
  }

  const results = payload.results;

  if (results === undefined || results === null) {
    return [];
  }

  if (!Array.isArray(results)) {
    throw new ResponseShapeError(`Invalid ${label} payload: results must be an array`);
  }

  return results;
}

function toIdString(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  return null;
}

function toPropertyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }

  return JSON.stringify(value);
}

function parseRecord(value: unknown): CrmRecord {
  if (!isRecordLike(value)) {
    throw new ResponseShapeError("Invalid object payload: record must be an object");
  }

  const id = toIdString(value.id);
  if (id === null) {
    throw new ResponseShapeError("Invalid object payload: missing record id");
  }

  const properties: Record<string, string> = {};
  const rawProperties = value.properties;

  if (isRecordLike(rawProperties)) {
    for (const [name, raw] of Object.entries(rawProperties)) {
      properties[name] = toPropertyValue(raw);
    }
  }

  return { id, properties };
}

export function parseObjectsPage(payload: unknown): CrmRecord[] {
  return readResults(payload, "object").map(parseRecord);
}

export function parsePropertyNames(payload: unknown): string[] {
  const names: string[] = [];

  for (const entry of readResults(payload, "properties")) {
    if (isRecordLike(entry) && typeof entry.name === "string" && entry.name.length > 0) {
      names.push(entry.name);
    }
  }

  return names;
}

export function parseAssociatedIds(payload: unknown): string[] {
  return readResults(payload, "association").map((entry) => {
    if (!isRecordLike(entry)) {
      return "unknown";
    }

    return toIdString(entry.id) ?? toIdString(entry.toObjectId) ?? "unknown";
  });
}
