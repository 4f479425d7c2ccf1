import type { ClickHouseClient } from "@clickhouse/client";
import { quoteIdentifier, type Logger } from "../commons";
import { describeError, SinkWriteError } from "../errors";
import { ROW_SCHEMA, toJsonRow, type Row, type WarehouseType } from "../model";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../utils/backoff";
import { formatWindow } from "../windowing/fixedWindows";
import type { WindowBatch, WindowSink } from "./types";

/**
 * Identifies the target table. ClickHouse has no project tier: the dataset
 * is the database, and the project names the client application.
 */
export interface TableReference {
  projectId: string;
  datasetId: string;
  tableId: string;
}

export const DEFAULT_TABLE_REFERENCE: TableReference = {
  projectId: "local",
  datasetId: "inventory",
  tableId: "customers",
};

export interface WarehouseColumn {
  name: string;
  type: string;
}

/**
 * The warehouse operations the table sink needs.
 */
export interface WarehouseClient {
  command: (query: string) => Promise<void>;
  insert: (table: string, rows: readonly Row[]) => Promise<void>;
  describeColumns: (table: string) => Promise<WarehouseColumn[]>;
  close: () => Promise<void>;
}

const CLICKHOUSE_TYPES: Record<WarehouseType, string> = {
  INT64: "Int64",
  STRING: "String",
};

// ClickHouse error codes raised when a concurrent writer created the object first
const TABLE_ALREADY_EXISTS = "57";
const DATABASE_ALREADY_EXISTS = "82";

export function clickhouseWarehouse(client: ClickHouseClient): WarehouseClient {
  return {
    command: async (query) => {
      await client.command({
        query,
        clickhouse_settings: { wait_end_of_query: 1 },
      });
    },
    insert: async (table, rows) => {
      await client.insert({
        table,
        values: rows.map(toJsonRow),
        format: "JSONEachRow",
      });
    },
    describeColumns: async (table) => {
      const result = await client.query({
        query: `DESCRIBE TABLE ${table}`,
        format: "JSONEachRow",
      });
      return result.json<WarehouseColumn>();
    },
    close: () => client.close(),
  };
}

export const qualifiedTableName = (table: TableReference): string =>
  `${quoteIdentifier(table.datasetId)}.${quoteIdentifier(table.tableId)}`;

export function createTableStatement(table: TableReference): string {
  const columns = ROW_SCHEMA.map(
    (field) => `  ${quoteIdentifier(field.name)} ${CLICKHOUSE_TYPES[field.type]}`,
  ).join(",\n");
  return `CREATE TABLE IF NOT EXISTS ${qualifiedTableName(table)}
(
${columns}
)
ENGINE = MergeTree
ORDER BY (${quoteIdentifier("id")}, ${quoteIdentifier("__lsn")})`;
}

const isAlreadyExistsError = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  (error.code === TABLE_ALREADY_EXISTS || error.code === DATABASE_ALREADY_EXISTS);

export interface TableSinkOptions {
  table: TableReference;
  warehouse: WarehouseClient;
  logger: Logger;
  retryPolicy?: RetryPolicy;
}

/**
 * Appends fired windows to a warehouse table, creating it when absent.
 *
 * Writes are at-least-once: an insert retried after a partial failure can
 * duplicate rows, which readers dedupe on (id, __lsn).
 */
export class TableSink implements WindowSink {
  readonly kind = "table" as const;
  readonly table: TableReference;
  private readonly warehouse: WarehouseClient;
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private ready: Promise<void> | undefined;

  constructor(options: TableSinkOptions) {
    this.table = options.table;
    this.warehouse = options.warehouse;
    this.logger = options.logger;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  open(): Promise<void> {
    return this.ensureTable();
  }

  /**
   * Creates the table with the declared schema unless it exists, then checks
   * the existing columns against that schema. Safe to race with other writers.
   */
  ensureTable(): Promise<void> {
    let ready = this.ready;
    if (!ready) {
      const pending = this.createIfAbsent();
      // a failed attempt is forgotten so the next write tries again
      pending.then(undefined, () => {
        if (this.ready === pending) {
          this.ready = undefined;
        }
      });
      this.ready = ready = pending;
    }
    return ready;
  }

  async write(batch: WindowBatch): Promise<void> {
    if (batch.rows.length === 0) {
      return;
    }
    await this.ensureTable();

    const name = qualifiedTableName(this.table);
    await this.retrying(
      `append ${batch.rows.length} row(s) for window ${formatWindow(batch.window)} to ${name}`,
      () => this.warehouse.insert(name, batch.rows),
    );
    this.logger.log(
      `Appended ${batch.rows.length} row(s) from partition ${batch.partition} window ${formatWindow(batch.window)} to ${name}`,
    );
  }

  async close(): Promise<void> {
    await this.warehouse.close();
  }

  private async createIfAbsent(): Promise<void> {
    const name = qualifiedTableName(this.table);

    await this.retrying(`create database ${this.table.datasetId}`, () =>
      this.runDdl(
        `CREATE DATABASE IF NOT EXISTS ${quoteIdentifier(this.table.datasetId)}`,
      ),
    );
    await this.retrying(`create table ${name}`, () =>
      this.runDdl(createTableStatement(this.table)),
    );

    const columns = await this.retrying(`describe table ${name}`, () =>
      this.warehouse.describeColumns(name),
    );
    const actual = columns.map((c) => `${c.name} ${c.type}`).join(", ");
    const expected = ROW_SCHEMA.map(
      (field) => `${field.name} ${CLICKHOUSE_TYPES[field.type]}`,
    ).join(", ");
    if (actual !== expected) {
      throw new SinkWriteError(
        `Table ${name} does not match the declared schema: expected (${expected}), found (${actual})`,
      );
    }
    this.logger.log(`Table ${name} is ready`);
  }

  private async runDdl(statement: string): Promise<void> {
    try {
      await this.warehouse.command(statement);
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        this.logger.log(`Another writer created it first: ${describeError(error)}`);
        return;
      }
      throw error;
    }
  }

  private async retrying<T>(what: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(operation, {
        policy: this.retryPolicy,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            `Failed to ${what} (attempt ${attempt}/${this.retryPolicy.retries}), retrying in ${delayMs}ms: ${describeError(error)}`,
          );
        },
      });
    } catch (error) {
      throw new SinkWriteError(
        `Failed to ${what} after ${this.retryPolicy.retries + 1} attempt(s): ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
