import { Readable } from "node:stream";
import { logError, type Logger } from "../commons";
import { ConfigError } from "../errors";
import type { RecordDecoder } from "../decoder/decoder";
import type { DecodedRecord, RawEvent, Row } from "../model";
import { projectRow } from "../projection/rowProjector";
import type { WindowSink } from "../sinks/types";
import { OffsetLedger } from "../source/offsetLedger";
import {
  FixedWindowAssigner,
  formatWindow,
  type LatePolicy,
  type Window,
  type WindowBounds,
} from "../windowing/fixedWindows";
import type { LateRecordOutput } from "./lateOutput";

export const DEFAULT_DECODE_CONCURRENCY = 16;

/**
 * What shutdown does with windows that are still open.
 * - `flush`: close and write them, best effort
 * - `discard`: drop them; their records are read again after restart
 */
export type DrainPolicy = "flush" | "discard";

export interface PartitionWorkerOptions {
  topic: string;
  partition: number;
  decoder: RecordDecoder;
  sink: WindowSink;
  windowSizeMs: number;
  allowedLatenessMs: number;
  latePolicy: LatePolicy;
  lateOutput?: LateRecordOutput;
  decodeConcurrency?: number;
  logger: Logger;
}

interface DecodedEvent {
  event: RawEvent;
  /** Null for tombstones */
  record: DecodedRecord | null;
}

export interface PartitionStats {
  received: number;
  assigned: number;
  late: number;
  tombstones: number;
  flushedWindows: number;
  flushedRows: number;
  discardedWindows: number;
}

/**
 * Owns the open windows and the offset ledger of one partition.
 *
 * Batches, watermark ticks and the final drain run one after another, so
 * window state is never touched by two tasks at once.
 */
export class PartitionWorker {
  readonly partition: number;
  readonly ledger = new OffsetLedger();
  readonly stats: PartitionStats = {
    received: 0,
    assigned: 0,
    late: 0,
    tombstones: 0,
    flushedWindows: 0,
    flushedRows: 0,
    discardedWindows: 0,
  };
  private readonly options: PartitionWorkerOptions;
  private readonly assigner: FixedWindowAssigner<Row>;
  private readonly logger: Logger;
  private chain: Promise<void> = Promise.resolve();

  constructor(options: PartitionWorkerOptions) {
    if (options.latePolicy === "dead-letter" && !options.lateOutput) {
      throw new ConfigError(
        "Late policy 'dead-letter' requires a late record output",
      );
    }
    this.options = options;
    this.partition = options.partition;
    this.logger = options.logger;
    this.assigner = new FixedWindowAssigner<Row>({
      sizeMs: options.windowSizeMs,
      allowedLatenessMs: options.allowedLatenessMs,
    });
  }

  get bufferedRecords(): number {
    return this.assigner.bufferedCount;
  }

  get openWindows(): number {
    return this.assigner.openWindowCount;
  }

  /**
   * Decodes, projects and assigns a batch. Any decode or projection failure
   * rejects the whole call; no row of the failing record is kept.
   */
  processEvents(events: readonly RawEvent[]): Promise<void> {
    return this.serialize(() => this.process(events));
  }

  /**
   * Fires every window the watermark has passed and returns the offset that
   * is now safe to commit, if it moved.
   */
  onWatermark(watermarkMs: number): Promise<string | undefined> {
    return this.serialize(async () => {
      for (const window of this.assigner.advanceWatermark(watermarkMs)) {
        await this.flush(window);
      }
      return this.ledger.committable();
    });
  }

  /**
   * Closes all open windows at shutdown and applies the drain policy.
   */
  drain(policy: DrainPolicy): Promise<string | undefined> {
    return this.serialize(async () => {
      for (const window of this.assigner.closeAll()) {
        if (policy === "discard") {
          this.discardUnflushed(window);
          continue;
        }
        try {
          await this.flush(window);
        } catch (error) {
          this.logger.error(
            `Best-effort flush of window ${formatWindow(window.bounds)} failed; its records will be read again`,
          );
          if (error instanceof Error) {
            logError(this.logger, error);
          }
          this.discardUnflushed(window);
        }
      }
      return this.ledger.committable();
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    // The caller sees the failure; later tasks still run in order
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async process(events: readonly RawEvent[]): Promise<void> {
    this.stats.received += events.length;

    // map() keeps input order while decoding with bounded concurrency.
    // Streams cannot carry null, so tombstones travel wrapped.
    const decoded: DecodedEvent[] = await Readable.from(events)
      .map(
        async (event: RawEvent): Promise<DecodedEvent> => ({
          event,
          record:
            event.value === null ?
              null
            : await this.options.decoder.decode(event.value),
        }),
        { concurrency: this.options.decodeConcurrency ?? DEFAULT_DECODE_CONCURRENCY },
      )
      .toArray();

    for (const { event, record } of decoded) {
      if (record === null) {
        this.stats.tombstones++;
        this.ledger.observe(event.offset);
        this.logger.log(`Skipping tombstone at offset ${event.offset}`);
        continue;
      }

      const row = projectRow(record);
      const assignment = this.assigner.assign(event.timestamp, row);
      if (assignment.kind === "assigned") {
        this.stats.assigned++;
        this.ledger.track(assignment.window.bounds.start, event.offset);
      } else {
        await this.handleLate(event, row, assignment.bounds);
      }
    }
  }

  private async handleLate(
    event: RawEvent,
    row: Row,
    bounds: WindowBounds,
  ): Promise<void> {
    this.stats.late++;
    const lateOutput = this.options.lateOutput;

    if (this.options.latePolicy === "dead-letter" && lateOutput) {
      await lateOutput.send({
        row,
        window: bounds,
        topic: event.topic,
        partition: event.partition,
        offset: event.offset,
        timestamp: event.timestamp,
      });
    } else {
      this.logger.warn(
        `Dropping late record at offset ${event.offset}: window ${formatWindow(bounds)} already closed`,
      );
    }
    this.ledger.observe(event.offset);
  }

  private async flush(window: Window<Row>): Promise<void> {
    const rows = window.items;
    await this.options.sink.write({
      window: window.bounds,
      partition: this.partition,
      rows,
    });
    window.markFlushed();
    this.ledger.release(window.bounds.start);
    this.stats.flushedWindows++;
    this.stats.flushedRows += rows.length;
    this.logger.log(
      `Flushed window ${formatWindow(window.bounds)} with ${rows.length} row(s)`,
    );
    window.discard();
  }

  private discardUnflushed(window: Window<Row>): void {
    this.stats.discardedWindows++;
    this.logger.warn(
      `Discarding window ${formatWindow(window.bounds)} with ${window.items.length} unflushed row(s)`,
    );
    window.discard();
  }
}
