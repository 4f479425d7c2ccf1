export type CdcOperation = "create" | "update" | "delete" | "read";

/**
 * Operation codes as the change-capture connector writes them, and the
 * long names the warehouse row carries.
 */
const OPERATION_CODES: Readonly<Record<string, CdcOperation>> = {
  c: "create",
  u: "update",
  d: "delete",
  r: "read",
  create: "create",
  update: "update",
  delete: "delete",
  read: "read",
};

export function normalizeOperation(op: string): CdcOperation | undefined {
  return Object.prototype.hasOwnProperty.call(OPERATION_CODES, op) ?
      OPERATION_CODES[op]
    : undefined;
}

/**
 * One record as read from a log partition, before decoding.
 */
export interface RawEvent {
  /** Ignored by the pipeline; kept for diagnostics */
  key: Buffer | null;
  /** Null for tombstones */
  value: Buffer | null;
  topic: string;
  partition: number;
  offset: string;
  /** Processing-time arrival, epoch milliseconds */
  timestamp: number;
}

export interface DecodedRecord {
  schemaId: number;
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  __op: string;
  __source_ts_ms: bigint;
  __lsn: bigint;
}

export interface Row {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  __op: CdcOperation;
  __source_ts_ms: bigint;
  __lsn: bigint;
}

/**
 * A row as JSON carries it. Int64 columns travel as decimal strings, which
 * ClickHouse accepts for Int64 and which keep values above 2^53 exact.
 */
export type JsonRow = Omit<Row, "__source_ts_ms" | "__lsn"> & {
  __source_ts_ms: string;
  __lsn: string;
};

export const toJsonRow = (row: Row): JsonRow => ({
  ...row,
  __source_ts_ms: row.__source_ts_ms.toString(),
  __lsn: row.__lsn.toString(),
});

export type WarehouseType = "INT64" | "STRING";

export interface TableField {
  name: keyof Row;
  type: WarehouseType;
}

/**
 * Declared target schema. Row objects are built with their keys in this order.
 */
export const ROW_SCHEMA = [
  { name: "id", type: "INT64" },
  { name: "first_name", type: "STRING" },
  { name: "last_name", type: "STRING" },
  { name: "email", type: "STRING" },
  { name: "__op", type: "STRING" },
  { name: "__source_ts_ms", type: "INT64" },
  { name: "__lsn", type: "INT64" },
] as const satisfies readonly TableField[];
