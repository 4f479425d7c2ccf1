import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../commons";
import { describeError, SinkWriteError } from "../errors";
import { toJsonRow, type Row } from "../model";
import { parseRow } from "../projection/rowProjector";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../utils/backoff";
import type { WindowBounds } from "../windowing/fixedWindows";
import type { WindowBatch, WindowSink } from "./types";

const pad = (value: number): string => value.toString().padStart(5, "0");

/**
 * Deterministic name of the file holding one shard of one window, e.g.
 * `out/customers-1970-01-01T00:00:00.000Z-1970-01-01T00:00:02.000Z-00000-of-00001`.
 */
export function windowFileName(
  outputPath: string,
  window: WindowBounds,
  shard: number,
  numShards: number,
): string {
  const start = new Date(window.start).toISOString();
  const end = new Date(window.end).toISOString();
  return `${outputPath}-${start}-${end}-${pad(shard)}-of-${pad(numShards)}`;
}

const compareRows = (a: Row, b: Row): number =>
  a.__lsn < b.__lsn ? -1
  : a.__lsn > b.__lsn ? 1
  : a.id - b.id;

/**
 * Pretty-prints rows one JSON object after another, ordered by (__lsn, id)
 * so repeated runs over the same data produce identical files.
 */
export function formatRows(rows: readonly Row[]): string {
  return [...rows]
    .sort(compareRows)
    .map((row) => `${JSON.stringify(toJsonRow(row), null, 2)}\n`)
    .join("");
}

/**
 * Parses the output of {@link formatRows} back into rows.
 */
export function parseRows(text: string): Row[] {
  const rows: Row[] = [];
  let pending: string[] = [];

  for (const line of text.split("\n")) {
    if (pending.length === 0 && line.trim() === "") {
      continue;
    }
    pending.push(line);
    // Rows are flat, so only a row's own closing brace sits in column 0
    if (line === "}") {
      rows.push(parseRow(JSON.parse(pending.join("\n"))));
      pending = [];
    }
  }

  if (pending.length > 0) {
    throw new SinkWriteError("Window file ends in the middle of a row");
  }
  return rows;
}

export async function readWindowFile(filePath: string): Promise<Row[]> {
  return parseRows(await fs.readFile(filePath, "utf-8"));
}

export interface FileSinkOptions {
  outputPath: string;
  /** Number of source partitions; each partition writes its own shard */
  numShards: number;
  logger: Logger;
  retryPolicy?: RetryPolicy;
}

/**
 * Diagnostic sink: one pretty-printed file per fired window and partition.
 */
export class FileSink implements WindowSink {
  readonly kind = "file" as const;
  private readonly options: FileSinkOptions;
  private readonly retryPolicy: RetryPolicy;

  constructor(options: FileSinkOptions) {
    if (!Number.isInteger(options.numShards) || options.numShards < 1) {
      throw new RangeError(
        `numShards must be a positive integer, got ${options.numShards}`,
      );
    }
    this.options = options;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  async open(): Promise<void> {
    const directory = path.dirname(path.resolve(this.options.outputPath));
    await fs.mkdir(directory, { recursive: true });
  }

  async write(batch: WindowBatch): Promise<void> {
    if (batch.rows.length === 0) {
      return;
    }
    if (batch.partition >= this.options.numShards) {
      throw new SinkWriteError(
        `Partition ${batch.partition} is outside the ${this.options.numShards} configured shard(s)`,
      );
    }

    const target = windowFileName(
      this.options.outputPath,
      batch.window,
      batch.partition,
      this.options.numShards,
    );
    const contents = formatRows(batch.rows);
    const temporary = `${target}.tmp-${process.pid}`;

    try {
      await withRetry(
        async () => {
          await fs.writeFile(temporary, contents, "utf-8");
          await fs.rename(temporary, target);
        },
        {
          policy: this.retryPolicy,
          onRetry: (error, attempt, delayMs) => {
            this.options.logger.warn(
              `Writing ${target} failed (attempt ${attempt}/${this.retryPolicy.retries}), retrying in ${delayMs}ms: ${describeError(error)}`,
            );
          },
        },
      );
    } catch (error) {
      throw new SinkWriteError(
        `Failed to write window file ${target}: ${describeError(error)}`,
        { cause: error },
      );
    }

    this.options.logger.log(`Wrote ${batch.rows.length} row(s) to ${target}`);
  }

  async close(): Promise<void> {}
}
