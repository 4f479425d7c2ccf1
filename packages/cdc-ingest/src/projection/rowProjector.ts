import { ProjectionInvariantError } from "../errors";
import {
  normalizeOperation,
  ROW_SCHEMA,
  type CdcOperation,
  type DecodedRecord,
  type Row,
  type WarehouseType,
} from "../model";

const matchesType = (value: unknown, type: WarehouseType): boolean =>
  type === "STRING" ?
    typeof value === "string"
  : typeof value === "bigint" ||
    (typeof value === "number" && Number.isSafeInteger(value));

// JSON.stringify throws on bigint
const formatValue = (value: unknown): string =>
  typeof value === "bigint" ? `${value}n` : JSON.stringify(value);

const assertOperation = (value: unknown): CdcOperation => {
  const op = typeof value === "string" ? normalizeOperation(value) : undefined;
  if (op === undefined) {
    throw new ProjectionInvariantError(
      `Field '__op' holds unknown operation ${formatValue(value)}`,
    );
  }
  return op;
};

const assertFields = (source: Record<string, unknown>, what: string): void => {
  for (const field of ROW_SCHEMA) {
    if (!matchesType(source[field.name], field.type)) {
      throw new ProjectionInvariantError(
        `${what} field '${field.name}' is not a valid ${field.type}: ${formatValue(source[field.name])}`,
      );
    }
  }
};

/**
 * Maps a decoded change record onto the warehouse row, keys in schema order.
 *
 * The decoder rejects malformed records first; a mismatch here is a bug,
 * not bad input.
 */
export function projectRow(record: DecodedRecord): Row {
  assertFields({ ...record }, "Decoded record");

  return {
    id: record.id,
    first_name: record.first_name,
    last_name: record.last_name,
    email: record.email,
    __op: assertOperation(record.__op),
    __source_ts_ms: record.__source_ts_ms,
    __lsn: record.__lsn,
  };
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Int64 columns come back as decimal strings from JSON
const readInt64 = (value: unknown): unknown =>
  typeof value === "string" && /^-?\d+$/.test(value) ? BigInt(value)
  : typeof value === "number" && Number.isSafeInteger(value) ? BigInt(value)
  : value;

/**
 * Validates a value read back from a sink against the row contract.
 */
export function parseRow(value: unknown): Row {
  if (!isObject(value)) {
    throw new ProjectionInvariantError(
      `Row must be an object, got ${formatValue(value)}`,
    );
  }
  const extra = Object.keys(value).filter(
    (key) => !ROW_SCHEMA.some((field) => field.name === key),
  );
  if (extra.length > 0) {
    throw new ProjectionInvariantError(
      `Row has undeclared field(s): ${extra.join(", ")}`,
    );
  }
  const fields: Record<string, unknown> = {
    ...value,
    __source_ts_ms: readInt64(value.__source_ts_ms),
    __lsn: readInt64(value.__lsn),
  };
  assertFields(fields, "Row");

  const { id, first_name, last_name, email, __source_ts_ms, __lsn } = fields;
  if (
    typeof id !== "number" ||
    typeof first_name !== "string" ||
    typeof last_name !== "string" ||
    typeof email !== "string" ||
    typeof __source_ts_ms !== "bigint" ||
    typeof __lsn !== "bigint"
  ) {
    throw new ProjectionInvariantError("Row fields do not match the schema");
  }

  return {
    id,
    first_name,
    last_name,
    email,
    __op: assertOperation(fields.__op),
    __source_ts_ms,
    __lsn,
  };
}
