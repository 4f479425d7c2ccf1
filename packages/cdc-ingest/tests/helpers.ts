import { expect } from "chai";
import type { Clock, Logger } from "../src/commons";
import { createAvroType } from "../src/decoder/decoder";
import type {
  RegistryFetch,
  RegistryResponse,
} from "../src/decoder/schemaRegistryClient";
import { frame } from "../src/decoder/wireFormat";
import type { RawEvent, Row } from "../src/model";
import type { WarehouseClient, WarehouseColumn } from "../src/sinks/tableSink";
import type { WindowBatch, WindowSink } from "../src/sinks/types";
import type {
  EventSource,
  PartitionBatch,
  PartitionBatchHandler,
  RevokedPartitionsHandler,
} from "../src/source/eventSource";
import type { RetryPolicy } from "../src/utils/backoff";

export const NO_WAIT_RETRY: RetryPolicy = {
  retries: 2,
  initialMs: 0,
  maxMs: 0,
  multiplier: 2,
  jitter: 0,
};

export interface LogLine {
  level: "log" | "warn" | "error";
  message: string;
}

export interface CapturingLogger extends Logger {
  lines: LogLine[];
  messages: (level: LogLine["level"]) => string[];
}

export const createCapturingLogger = (logPrefix = "test"): CapturingLogger => {
  const lines: LogLine[] = [];
  return {
    logPrefix,
    lines,
    log: (message) => {
      lines.push({ level: "log", message });
    },
    warn: (message) => {
      lines.push({ level: "warn", message });
    },
    error: (message) => {
      lines.push({ level: "error", message });
    },
    messages: (level) =>
      lines.filter((line) => line.level === level).map((line) => line.message),
  };
};

export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

/**
 * Awaits a promise that must reject and returns the error.
 */
export async function expectRejection(
  promise: Promise<unknown>,
  errorClass?: new (...args: never[]) => Error,
): Promise<Error> {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(errorClass ?? Error);
    if (error instanceof Error) {
      return error;
    }
  }
  expect.fail("expected promise to reject");
}

export const makeRow = (overrides: Partial<Row> = {}): Row => ({
  id: 1001,
  first_name: "Sally",
  last_name: "Thomas",
  email: "sally.thomas@example.test",
  __op: "read",
  __source_ts_ms: 1700000000000n,
  __lsn: 100n,
  ...overrides,
});

type AvroRecordSchema = Extract<
  Parameters<typeof createAvroType>[0],
  { type: "record" | "error" }
>;

// Flattened change record as the connector registers it
export const CUSTOMER_SCHEMA: AvroRecordSchema = {
  type: "record",
  name: "Value",
  namespace: "dbserver1.inventory.customers",
  fields: [
    { name: "id", type: "int" },
    { name: "first_name", type: "string" },
    { name: "last_name", type: "string" },
    { name: "email", type: ["null", "string"], default: null },
    { name: "__op", type: "string" },
    { name: "__source_ts_ms", type: "long" },
    { name: "__lsn", type: "long" },
  ],
};

export const CUSTOMER_SCHEMA_WITHOUT_EMAIL: AvroRecordSchema = {
  ...CUSTOMER_SCHEMA,
  fields: CUSTOMER_SCHEMA.fields.filter((field) => field.name !== "email"),
};

export interface CustomerRecord {
  id: number;
  first_name: string;
  last_name: string;
  email?: string | null;
  __op: string;
  __source_ts_ms: number | bigint;
  __lsn: number | bigint;
}

export const customer = (
  overrides: Partial<CustomerRecord> = {},
): CustomerRecord => ({
  id: 1001,
  first_name: "Sally",
  last_name: "Thomas",
  email: "sally.thomas@example.test",
  __op: "c",
  __source_ts_ms: 1700000000000,
  __lsn: 100,
  ...overrides,
});

/**
 * Avro-encodes `record` with `schema` and wraps it in the registry framing.
 */
export function encodeFramed(
  schemaId: number,
  schema: Parameters<typeof createAvroType>[0],
  record: object,
): Buffer {
  return frame(schemaId, createAvroType(schema).toBuffer(record));
}

export const jsonResponse = (
  status: number,
  body: unknown,
): RegistryResponse => ({
  status,
  json: async () => body,
});

export interface FakeRegistry {
  fetch: RegistryFetch;
  urls: string[];
}

/**
 * In-process registry serving `schemas` by id; unknown ids get the
 * registry's 404 body.
 */
export function createFakeRegistry(
  schemas: Record<number, object>,
): FakeRegistry {
  const urls: string[] = [];
  const fetch: RegistryFetch = async (url) => {
    urls.push(url);
    const id = Number(url.split("/").pop());
    const schema = schemas[id];
    if (schema === undefined) {
      return jsonResponse(404, {
        error_code: 40403,
        message: "Schema not found",
      });
    }
    return jsonResponse(200, { schema: JSON.stringify(schema) });
  };
  return { fetch, urls };
}

export const rawEvent = (
  partition: number,
  offset: number,
  timestamp: number,
  value: Buffer | null,
): RawEvent => ({
  key: null,
  value,
  topic: "dbserver1.inventory.customers",
  partition,
  offset: String(offset),
  timestamp,
});

class ClickHouseLikeError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.code = code;
  }
}

export interface FakeWarehouseOptions {
  /** Concurrent-creation race: CREATE TABLE on an existing table fails with code 57 */
  raceOnExistingTable?: boolean;
}

/**
 * In-memory warehouse speaking the DDL the table sink emits.
 */
export class FakeWarehouse implements WarehouseClient {
  readonly databases = new Set<string>();
  readonly tables = new Map<string, { columns: WarehouseColumn[]; rows: Row[] }>();
  readonly commands: string[] = [];
  insertCalls = 0;
  closed = false;
  private failingInserts = 0;
  private readonly options: FakeWarehouseOptions;

  constructor(options: FakeWarehouseOptions = {}) {
    this.options = options;
  }

  seedTable(name: string, columns: WarehouseColumn[], rows: Row[] = []): void {
    this.tables.set(name, { columns, rows: rows.map((row) => ({ ...row })) });
  }

  failNextInserts(count: number): void {
    this.failingInserts = count;
  }

  async command(query: string): Promise<void> {
    this.commands.push(query);

    const database = /^CREATE DATABASE IF NOT EXISTS `([^`]+)`$/.exec(query);
    if (database) {
      this.databases.add(database[1]);
      return;
    }

    const table = /^CREATE TABLE IF NOT EXISTS (`([^`]+)`\.`[^`]+`)\n/.exec(query);
    if (table) {
      if (!this.databases.has(table[2])) {
        throw new ClickHouseLikeError(`Database ${table[2]} does not exist`, "81");
      }
      if (this.tables.has(table[1])) {
        if (this.options.raceOnExistingTable) {
          throw new ClickHouseLikeError(`Table ${table[1]} already exists`, "57");
        }
        return;
      }
      const columns = [...query.matchAll(/^ {2}`([^`]+)` (\w+),?$/gm)].map(
        (match) => ({ name: match[1], type: match[2] }),
      );
      this.tables.set(table[1], { columns, rows: [] });
      return;
    }

    throw new Error(`Unsupported statement: ${query}`);
  }

  async insert(table: string, rows: readonly Row[]): Promise<void> {
    this.insertCalls++;
    if (this.failingInserts > 0) {
      this.failingInserts--;
      throw new Error("connection reset");
    }
    const target = this.tables.get(table);
    if (!target) {
      throw new ClickHouseLikeError(`Table ${table} does not exist`, "60");
    }
    target.rows.push(...rows.map((row) => ({ ...row })));
  }

  async describeColumns(table: string): Promise<WarehouseColumn[]> {
    const target = this.tables.get(table);
    if (!target) {
      throw new ClickHouseLikeError(`Table ${table} does not exist`, "60");
    }
    return target.columns.map((column) => ({ ...column }));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  rowsOf(table: string): Row[] {
    return this.tables.get(table)?.rows ?? [];
  }
}

/**
 * Sink keeping every written batch in memory.
 */
export class RecordingSink implements WindowSink {
  readonly kind = "table" as const;
  readonly batches: WindowBatch[] = [];
  opened = false;
  closed = false;
  failWrites = false;

  async open(): Promise<void> {
    this.opened = true;
  }

  async write(batch: WindowBatch): Promise<void> {
    if (this.failWrites) {
      throw new Error("sink unavailable");
    }
    this.batches.push({ ...batch, rows: [...batch.rows] });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Source whose batches are pushed by the test.
 */
export class FakeEventSource implements EventSource {
  readonly topic = "dbserver1.inventory.customers";
  readonly commits: { partition: number; offset: string }[] = [];
  readonly resumed: number[] = [];
  readonly batchPauses: number[] = [];
  started = false;
  paused = false;
  closed = false;
  private handler: PartitionBatchHandler | undefined;
  private onFatal: ((error: Error) => void) | undefined;
  private onRevoked: RevokedPartitionsHandler | undefined;

  async partitionCount(): Promise<number> {
    return 1;
  }

  async start(
    handler: PartitionBatchHandler,
    onFatal: (error: Error) => void,
    onRevoked: RevokedPartitionsHandler,
  ): Promise<void> {
    this.started = true;
    this.handler = handler;
    this.onFatal = onFatal;
    this.onRevoked = onRevoked;
  }

  async deliver(partition: number, events: RawEvent[]): Promise<boolean> {
    if (!this.handler) {
      throw new Error("source was not started");
    }
    const batch: PartitionBatch = {
      topic: this.topic,
      partition,
      events,
      heartbeat: async () => {},
      pause: () => {
        this.batchPauses.push(partition);
      },
    };
    return this.handler(batch);
  }

  crash(error: Error): void {
    this.onFatal?.(error);
  }

  revoke(partitions: number[]): void {
    this.onRevoked?.(partitions);
  }

  async commit(partition: number, offset: string): Promise<void> {
    this.commits.push({ partition, offset });
  }

  resume(partition: number): void {
    this.resumed.push(partition);
  }

  async pause(): Promise<void> {
    this.paused = true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const nextTurn = (): Promise<void> =>
  new Promise((resolve) => setImmediate(resolve));
