import type { RawEvent } from "../model";

export type OffsetResetPolicy = "earliest" | "latest";

/**
 * Where a RawEvent's timestamp comes from.
 * - `processing-time`: the wall clock when the record was read
 * - `log-append-time`: the timestamp the broker stored with the record
 */
export type TimestampPolicy = "processing-time" | "log-append-time";

export interface PartitionBatch {
  topic: string;
  partition: number;
  /** In log order */
  events: RawEvent[];
  heartbeat: () => Promise<void>;
  /** Stops fetching this partition until the source resumes it */
  pause: () => void;
}

/**
 * Returns false when the batch was not consumed (e.g. during shutdown);
 * its records are then delivered again.
 */
export type PartitionBatchHandler = (batch: PartitionBatch) => Promise<boolean>;

/**
 * Called after a group rebalance with the partitions this member lost.
 */
export type RevokedPartitionsHandler = (partitions: number[]) => void;

/**
 * An ordered-per-partition stream of RawEvents with manual offset commits.
 */
export interface EventSource {
  readonly topic: string;
  partitionCount: () => Promise<number>;
  start: (
    handler: PartitionBatchHandler,
    onFatal: (error: Error) => void,
    onRevoked: RevokedPartitionsHandler,
  ) => Promise<void>;
  /** Persists `offset` as the next offset to read for `partition` */
  commit: (partition: number, offset: string) => Promise<void>;
  resume: (partition: number) => void;
  /** Stops fetching every partition; commits remain possible */
  pause: () => Promise<void>;
  close: () => Promise<void>;
}
