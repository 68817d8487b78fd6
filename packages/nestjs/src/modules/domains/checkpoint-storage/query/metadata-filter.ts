import { InvalidArgumentError } from "../errors/checkpoint.errors";
import type { JsonValue, MetadataFilter } from "../types/checkpoint.types";

/** A value as SQLite sees it on either side of a comparison */
export type SqlValue = string | number | null;

export type FilterOperand =
  | { kind: "null" }
  | { kind: "scalar"; value: string | number }
  | { kind: "boolean"; value: boolean }
  | { kind: "structured"; value: JsonValue[] | { [key: string]: JsonValue } };

const isStructured = (
  value: object,
): value is JsonValue[] | { [key: string]: JsonValue } => {
  if (Array.isArray(value)) {
    return true;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Splits a dot-separated field path into its segments. Segments are used
 * verbatim inside double quotes, so each must be non-empty and free of '"'.
 */
export function filterKeySegments(key: string): string[] {
  const segments = key.split(".");
  if (segments.some((segment) => segment === "" || segment.includes('"'))) {
    throw new InvalidArgumentError(
      `Metadata filter key ${JSON.stringify(key)} must be a dot-separated path of non-empty segments without '"'.`,
    );
  }
  return segments;
}

/**
 * JSON path of a metadata field, one quoted member per segment: `writes.foo`
 * becomes `$."writes"."foo"`. Brackets stay literal.
 */
export const metadataPath = (key: string): string =>
  `$${filterKeySegments(key)
    .map((segment) => `."${segment}"`)
    .join("")}`;

export function classifyFilterValue(key: string, value: unknown): FilterOperand {
  if (value === null) {
    return { kind: "null" };
  }
  switch (typeof value) {
    case "string":
      return { kind: "scalar", value };
    case "number":
      if (Number.isFinite(value)) {
        return { kind: "scalar", value };
      }
      break;
    case "boolean":
      return { kind: "boolean", value };
    case "object":
      if (value !== null && isStructured(value)) {
        return { kind: "structured", value };
      }
      break;
  }
  throw new InvalidArgumentError(
    `Unsupported value for metadata filter key "${key}".`,
  );
}

export function operandToSqlValue(operand: FilterOperand): SqlValue {
  switch (operand.kind) {
    case "null":
      return null;
    case "scalar":
      return operand.value;
    case "boolean":
      return operand.value ? 1 : 0;
    case "structured":
      // compact form, the same text json_extract returns for embedded JSON
      return JSON.stringify(operand.value);
  }
}

/**
 * What `json_extract` yields for a stored metadata field: missing and null
 * become NULL, booleans 1/0 and objects/arrays their compact JSON text.
 */
export function toSqlValue(value: unknown): SqlValue {
  switch (typeof value) {
    case "undefined":
      return null;
    case "string":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "boolean":
      return value ? 1 : 0;
    case "bigint":
      return Number(value);
    case "object":
      return value === null ? null : (JSON.stringify(value) ?? null);
    default:
      return null;
  }
}

export type CompiledMetadataFilter = Array<{
  key: string;
  segments: string[];
  operand: FilterOperand;
}>;

/**
 * Validates every key and value of a filter up front.
 */
export function compileMetadataFilter(
  filter: MetadataFilter,
): CompiledMetadataFilter {
  return Object.entries(filter).map(([key, value]) => {
    const segments = filterKeySegments(key);
    return { key, segments, operand: classifyFilterValue(key, value) };
  });
}

const isObjectNode = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// own properties only; a path through an array or scalar is missing
function resolvePath(
  metadata: Record<string, unknown>,
  segments: string[],
): unknown {
  let current: unknown = metadata;
  for (const segment of segments) {
    if (
      !isObjectNode(current) ||
      !Object.prototype.hasOwnProperty.call(current, segment)
    ) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * In-process twin of the SQL predicate built by `searchWhere`.
 */
export function matchesMetadataFilter(
  metadata: Record<string, unknown>,
  filter: CompiledMetadataFilter,
): boolean {
  return filter.every(
    ({ segments, operand }) =>
      toSqlValue(resolvePath(metadata, segments)) === operandToSqlValue(operand),
  );
}
