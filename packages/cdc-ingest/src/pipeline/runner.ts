import {
  createLogger,
  getClickhouseClient,
  getKafkaClient,
  logError,
  systemClock,
  type Clock,
  type Logger,
} from "../commons";
import type { PipelineOptions } from "../config/runtime";
import { SchemaCache } from "../decoder/schemaCache";
import { SchemaRegistryClient } from "../decoder/schemaRegistryClient";
import { SchemaRegistryDecoder, type RecordDecoder } from "../decoder/decoder";
import { CdcPipelineError, describeError } from "../errors";
import {
  createWindowSink,
  describeSinkSelection,
} from "../sinks/sinkRouter";
import { clickhouseWarehouse } from "../sinks/tableSink";
import type { WindowSink } from "../sinks/types";
import type { EventSource, PartitionBatch } from "../source/eventSource";
import { KafkaEventSource } from "../source/kafkaEventSource";
import type { LatePolicy } from "../windowing/fixedWindows";
import { DeadLetterLateOutput, type LateRecordOutput } from "./lateOutput";
import {
  PartitionWorker,
  type DrainPolicy,
  type PartitionStats,
} from "./partitionWorker";

export interface PipelineSettings {
  topic: string;
  windowSizeMs: number;
  allowedLatenessMs: number;
  latePolicy: LatePolicy;
  drainPolicy: DrainPolicy;
  watermarkIntervalMs: number;
  /** A partition holding this many unflushed records is paused */
  maxBufferedRecords: number;
  decodeConcurrency: number;
}

export interface PipelineDependencies {
  source: EventSource;
  decoder: RecordDecoder;
  sink: WindowSink;
  lateOutput?: LateRecordOutput;
  logger: Logger;
  clock?: Clock;
  /** Logger for one partition's worker; defaults to `topic [partition N]` */
  workerLogger?: (partition: number) => Logger;
}

export interface PipelineControl {
  /** Stops consuming, drains open windows and closes every resource */
  stop: () => Promise<void>;
  /** Settles once the pipeline has shut down; rejects on a fatal error */
  done: Promise<void>;
}

const emptyStats = (): PartitionStats => ({
  received: 0,
  assigned: 0,
  late: 0,
  tombstones: 0,
  flushedWindows: 0,
  flushedRows: 0,
  discardedWindows: 0,
});

/**
 * Routes partition batches to their workers, drives the processing-time
 * watermark and commits offsets as windows are flushed.
 *
 * Timers live in {@link startPipeline}; this class only reacts to calls.
 */
export class CdcPipeline {
  private readonly settings: PipelineSettings;
  private readonly deps: PipelineDependencies;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly workers = new Map<number, PartitionWorker>();
  private readonly paused = new Set<number>();
  private stopping = false;

  constructor(settings: PipelineSettings, deps: PipelineDependencies) {
    this.settings = settings;
    this.deps = deps;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  get isStopping(): boolean {
    return this.stopping;
  }

  get pausedPartitions(): readonly number[] {
    return [...this.paused].sort((a, b) => a - b);
  }

  /**
   * Hands one batch to its partition's worker. Returns false once shutdown
   * has begun, leaving the batch to be read again.
   */
  async handleBatch(batch: PartitionBatch): Promise<boolean> {
    if (this.stopping) {
      return false;
    }

    const worker = this.workerFor(batch.partition);
    await worker.processEvents(batch.events);
    await batch.heartbeat();

    if (
      worker.bufferedRecords >= this.settings.maxBufferedRecords &&
      !this.paused.has(batch.partition)
    ) {
      this.paused.add(batch.partition);
      batch.pause();
      this.logger.warn(
        `Pausing partition ${batch.partition}: ${worker.bufferedRecords} record(s) waiting for their windows to fire`,
      );
    }
    return true;
  }

  /**
   * Advances every worker's watermark to the current processing time,
   * commits the offsets that became safe and resumes drained partitions.
   */
  async tick(): Promise<void> {
    if (this.stopping) {
      return;
    }
    const watermark = this.clock.now();

    await Promise.all(
      [...this.workers.values()].map(async (worker) => {
        const offset = await worker.onWatermark(watermark);
        await this.commit(worker, offset);

        if (
          this.paused.has(worker.partition) &&
          worker.bufferedRecords < this.settings.maxBufferedRecords &&
          !this.stopping
        ) {
          this.paused.delete(worker.partition);
          this.deps.source.resume(worker.partition);
          this.logger.log(`Resuming partition ${worker.partition}`);
        }
      }),
    );
  }

  /**
   * Stops consuming, applies the drain policy to every open window, commits
   * what became safe and closes the source, sink, late output and decoder.
   */
  async shutdown(): Promise<void> {
    this.stopping = true;
    this.logger.log(
      `Stopping pipeline (drain policy: ${this.settings.drainPolicy})...`,
    );

    try {
      await this.deps.source.pause();
      await Promise.all(
        [...this.workers.values()].map(async (worker) => {
          const offset = await worker.drain(this.settings.drainPolicy);
          await this.commit(worker, offset);
        }),
      );
      this.logStats();
    } finally {
      await this.closeResources();
    }
  }

  /**
   * Drops the workers of partitions the group moved to another member. Open
   * windows get the drain policy but nothing is committed: the new owner
   * reads those records again.
   */
  async revokePartitions(partitions: readonly number[]): Promise<void> {
    await Promise.all(
      partitions.map(async (partition) => {
        const worker = this.workers.get(partition);
        this.paused.delete(partition);
        if (!worker) {
          return;
        }
        this.workers.delete(partition);
        await worker.drain(this.settings.drainPolicy);
        this.logger.log(
          `Released partition ${partition} (drain policy: ${this.settings.drainPolicy})`,
        );
      }),
    );
  }

  stats(): PartitionStats {
    const total = emptyStats();
    for (const worker of this.workers.values()) {
      total.received += worker.stats.received;
      total.assigned += worker.stats.assigned;
      total.late += worker.stats.late;
      total.tombstones += worker.stats.tombstones;
      total.flushedWindows += worker.stats.flushedWindows;
      total.flushedRows += worker.stats.flushedRows;
      total.discardedWindows += worker.stats.discardedWindows;
    }
    return total;
  }

  private workerFor(partition: number): PartitionWorker {
    let worker = this.workers.get(partition);
    if (!worker) {
      worker = new PartitionWorker({
        topic: this.settings.topic,
        partition,
        decoder: this.deps.decoder,
        sink: this.deps.sink,
        windowSizeMs: this.settings.windowSizeMs,
        allowedLatenessMs: this.settings.allowedLatenessMs,
        latePolicy: this.settings.latePolicy,
        lateOutput: this.deps.lateOutput,
        decodeConcurrency: this.settings.decodeConcurrency,
        logger:
          this.deps.workerLogger?.(partition) ??
          createLogger(`${this.settings.topic} [partition ${partition}]`),
      });
      this.workers.set(partition, worker);
    }
    return worker;
  }

  private async commit(
    worker: PartitionWorker,
    offset: string | undefined,
  ): Promise<void> {
    // a worker of a revoked partition no longer owns its offsets
    if (offset === undefined || this.workers.get(worker.partition) !== worker) {
      return;
    }
    await this.deps.source.commit(worker.partition, offset);
    worker.ledger.markCommitted(offset);
    this.logger.log(`Committed offset ${offset} for partition ${worker.partition}`);
  }

  private logStats(): void {
    const stats = this.stats();
    this.logger.log(
      `Received ${stats.received} record(s): ${stats.assigned} windowed, ${stats.late} late, ${stats.tombstones} tombstone(s); flushed ${stats.flushedRows} row(s) in ${stats.flushedWindows} window(s), discarded ${stats.discardedWindows} window(s)`,
    );
  }

  private async closeResources(): Promise<void> {
    const failures: unknown[] = [];
    const steps: [string, () => Promise<void> | void][] = [
      ["source", () => this.deps.source.close()],
      ["sink", () => this.deps.sink.close()],
      ["late record output", () => this.deps.lateOutput?.close()],
      ["decoder", () => this.deps.decoder.close()],
    ];

    for (const [name, close] of steps) {
      try {
        await close();
      } catch (error) {
        this.logger.error(`Failed to close ${name}: ${describeError(error)}`);
        failures.push(error);
      }
    }

    if (failures.length > 0) {
      throw new CdcPipelineError(
        `Failed to close ${failures.length} pipeline resource(s)`,
        { cause: failures[0] },
      );
    }
  }
}

/**
 * Starts consuming and ticking the watermark. The returned `done` settles
 * after shutdown: it resolves on `stop()` and rejects with the first fatal
 * error otherwise.
 */
export function startPipeline(
  settings: PipelineSettings,
  deps: PipelineDependencies,
): PipelineControl {
  const logger = deps.logger;
  const pipeline = new CdcPipeline(settings, deps);
  let timer: NodeJS.Timeout | undefined;
  let starting: Promise<void> | undefined;
  let stopRequested = false;
  let shuttingDown: Promise<void> | undefined;
  let settle: { resolve: () => void; reject: (error: Error) => void } | undefined;

  const done = new Promise<void>((resolve, reject) => {
    settle = { resolve, reject };
  });

  const shutdown = (fatal?: Error): Promise<void> => {
    if (!shuttingDown) {
      stopRequested = true;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      // A source still connecting can only be closed once it has started.
      // Its failure is reported through run().
      const started =
        starting ? starting.then(() => undefined, () => undefined)
        : Promise.resolve();
      shuttingDown = started.then(() => pipeline.shutdown()).then(
        () => {
          if (fatal) {
            settle?.reject(fatal);
          } else {
            logger.log("Pipeline stopped");
            settle?.resolve();
          }
        },
        (error: unknown) => {
          const failure =
            error instanceof Error ? error : new Error(String(error));
          logError(logger, failure);
          settle?.reject(fatal ?? failure);
        },
      );
    }
    return shuttingDown;
  };

  const fail = (error: unknown): void => {
    const failure = error instanceof Error ? error : new Error(String(error));
    logger.error("Pipeline failed:");
    logError(logger, failure);
    void shutdown(failure);
  };

  const scheduleTick = (): void => {
    if (stopRequested) {
      return;
    }
    timer = setTimeout(() => {
      pipeline.tick().then(scheduleTick, fail);
    }, settings.watermarkIntervalMs);
  };

  const run = async (): Promise<void> => {
    await deps.sink.open();
    if (stopRequested) {
      return;
    }
    starting = deps.source.start(
      (batch) => pipeline.handleBatch(batch),
      fail,
      (partitions) => {
        pipeline.revokePartitions(partitions).catch(fail);
      },
    );
    await starting;
    scheduleTick();
  };
  run().catch(fail);

  return {
    stop: async () => {
      await shutdown();
      return done;
    },
    done,
  };
}

/**
 * Builds the Kafka source, registry decoder, sink and optional late-record
 * producer from resolved options and starts the pipeline.
 */
export async function runCdcPipeline(
  options: PipelineOptions,
): Promise<PipelineControl> {
  const logger = createLogger(`cdc-ingest ${options.topic}`);
  logger.log(
    `Starting pipeline from ${options.topic} to ${describeSinkSelection(options.sink)}`,
  );

  const kafka = getKafkaClient(
    {
      clientId: options.groupId,
      broker: options.bootstrapServers,
      ...options.kafkaSecurity,
    },
    logger,
  );

  const source = new KafkaEventSource({
    kafka,
    topic: options.topic,
    groupId: options.groupId,
    offsetResetPolicy: options.offsetResetPolicy,
    timestampPolicy: options.timestampPolicy,
    partitionsConsumedConcurrently: options.partitionsConsumedConcurrently,
    logger,
  });

  const decoder = new SchemaRegistryDecoder({
    registry: new SchemaRegistryClient({
      url: options.schemaRegistryUrl,
      logger,
    }),
    logger,
    cache: new SchemaCache(),
  });

  // One shard per partition, so the file sink needs the partition count
  const numShards =
    options.sink.kind === "file" ? await source.partitionCount() : 1;

  const sink = createWindowSink(options.sink, {
    logger,
    numShards,
    createWarehouse: (table) =>
      clickhouseWarehouse(
        getClickhouseClient(options.clickhouse, table.projectId, logger),
      ),
  });

  let lateOutput: LateRecordOutput | undefined;
  if (options.latePolicy === "dead-letter") {
    const producer = kafka.producer();
    await producer.connect();
    lateOutput = new DeadLetterLateOutput(producer, options.lateTopic, logger);
  }

  return startPipeline(
    {
      topic: options.topic,
      windowSizeMs: Math.round(options.windowSizeSeconds * 1000),
      allowedLatenessMs: options.allowedLatenessMs,
      latePolicy: options.latePolicy,
      drainPolicy: options.drainPolicy,
      watermarkIntervalMs: options.watermarkIntervalMs,
      maxBufferedRecords: options.maxBufferedRecords,
      decodeConcurrency: options.decodeConcurrency,
    },
    { source, decoder, sink, lateOutput, logger },
  );
}
