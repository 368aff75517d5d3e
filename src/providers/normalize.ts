/**
 * Item normalization shared by all provider variants
 */

import { getPath, type FieldMap } from "./mapping.js";

import type { ExternalRecord, RecordWarning } from "./types.js";

export type NormalizeOutcome =
  | {
      kind: "record";
      record: ExternalRecord;
      /** optional fields that were present but unusable and got dropped */
      droppedFields: string[];
    }
  | { kind: "skipped"; warning: RecordWarning };

export interface NormalizeOptions {
  source: string;
  priceScale?: number;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readExternalId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  return null;
}

function readNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Map one raw listing item onto an ExternalRecord.
 *
 * Missing id, missing name or an unusable price reject the item; a bad
 * optional field is dropped (set to null) and reported in `droppedFields`.
 */
export function normalizeItem(
  item: unknown,
  fields: FieldMap,
  options: NormalizeOptions
): NormalizeOutcome {
  if (!isRecordObject(item)) {
    return {
      kind: "skipped",
      warning: { externalId: null, reason: "item is not an object" },
    };
  }

  const externalId = readExternalId(getPath(item, fields.externalId));
  if (externalId === null) {
    return {
      kind: "skipped",
      warning: { externalId: null, reason: `missing ${fields.externalId}` },
    };
  }

  const rawName = getPath(item, fields.name);
  if (typeof rawName !== "string" || rawName.trim() === "") {
    return {
      kind: "skipped",
      warning: { externalId, reason: `missing ${fields.name}` },
    };
  }

  const rawPrice = readNumber(getPath(item, fields.price));
  if (rawPrice === null || rawPrice < 0) {
    return {
      kind: "skipped",
      warning: { externalId, reason: `invalid ${fields.price}` },
    };
  }

  const droppedFields: string[] = [];

  const readText = (path: string | undefined): string | null => {
    if (path === undefined) {
      return null;
    }
    const value = getPath(item, path);
    if (value === undefined || value === null) {
      return null;
    }
    if (typeof value !== "string") {
      droppedFields.push(path);
      return null;
    }
    return value;
  };

  const readDimension = (path: string | undefined): number | null => {
    if (path === undefined) {
      return null;
    }
    const value = getPath(item, path);
    if (value === undefined || value === null) {
      return null;
    }
    const parsed = readNumber(value);
    if (parsed === null || parsed < 0) {
      droppedFields.push(path);
      return null;
    }
    return roundToCents(parsed);
  };

  const record: ExternalRecord = {
    externalId,
    name: rawName.trim(),
    description: readText(fields.description),
    price: roundToCents(rawPrice / (options.priceScale ?? 1)),
    category: readText(fields.category),
    height: readDimension(fields.height),
    length: readDimension(fields.length),
    depth: readDimension(fields.depth),
    source: options.source,
    rawPayload: item,
  };

  return { kind: "record", record, droppedFields };
}
