import type { CheckpointBound, MetadataFilter } from "../types/checkpoint.types";
import { getBoundCheckpointId } from "../utils/locator.utils";
import {
  compileMetadataFilter,
  metadataPath,
  operandToSqlValue,
  type SqlValue,
} from "./metadata-filter";

export type WhereClause = [clause: string, params: SqlValue[]];

/**
 * Predicates for a metadata filter, without the WHERE keyword:
 * `json_extract(CAST(metadata_bytes AS TEXT), ?) = ? AND ...`.
 * Both the field path and the value are bound parameters.
 */
export function metadataPredicate(filter: MetadataFilter): WhereClause {
  const predicates: string[] = [];
  const params: SqlValue[] = [];

  for (const { key, operand } of compileMetadataFilter(filter)) {
    const operator = operand.kind === "null" ? "IS ?" : "= ?";

    predicates.push(
      `json_extract(CAST(metadata_bytes AS TEXT), ?) ${operator}`,
    );
    params.push(metadataPath(key), operandToSqlValue(operand));
  }

  return [predicates.join(" AND "), params];
}

/**
 * WHERE clause for `search()`: every metadata pair plus the optional
 * `before` bound. Returns `["", []]` when nothing restricts the scan.
 */
export function searchWhere(
  filter: MetadataFilter,
  before?: CheckpointBound,
): WhereClause {
  const [predicate, params] = metadataPredicate(filter);
  const predicates = predicate === "" ? [] : [predicate];

  const beforeId = getBoundCheckpointId(before);
  if (beforeId !== undefined) {
    predicates.push("checkpoint_id < ?");
    params.push(beforeId);
  }

  if (predicates.length === 0) {
    return ["", []];
  }
  return [`WHERE ${predicates.join(" AND ")}`, params];
}
