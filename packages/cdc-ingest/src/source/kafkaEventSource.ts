import type {
  Admin,
  Consumer,
  ConsumerConfig,
  ConsumerCrashEvent,
  ConsumerEvents,
  ConsumerGroupJoinEvent,
  KafkaMessage,
} from "kafkajs";
import { logError, systemClock, type Clock, type Logger } from "../commons";
import { TransientIOError } from "../errors";
import type { RawEvent } from "../model";
import type {
  EventSource,
  OffsetResetPolicy,
  PartitionBatchHandler,
  RevokedPartitionsHandler,
  TimestampPolicy,
} from "./eventSource";

const SESSION_TIMEOUT_CONSUMER = 30000;
const HEARTBEAT_INTERVAL_CONSUMER = 3000;
const MAX_RETRIES_CONSUMER = 150;
export const DEFAULT_PARTITIONS_CONSUMED_CONCURRENTLY = 3;

/**
 * The part of a kafkajs consumer the source drives.
 */
export interface SourceConsumer
  extends Pick<
    Consumer,
    | "connect"
    | "disconnect"
    | "subscribe"
    | "run"
    | "commitOffsets"
    | "pause"
    | "resume"
  > {
  events: Pick<ConsumerEvents, "CRASH" | "GROUP_JOIN">;
  on(
    eventName: ConsumerEvents["CRASH"],
    listener: (event: ConsumerCrashEvent) => void,
  ): () => void;
  on(
    eventName: ConsumerEvents["GROUP_JOIN"],
    listener: (event: ConsumerGroupJoinEvent) => void,
  ): () => void;
}

/**
 * A kafkajs `Kafka` client, narrowed to what the source uses.
 */
export interface SourceKafkaClient {
  consumer: (config: ConsumerConfig) => SourceConsumer;
  admin: () => Pick<Admin, "connect" | "disconnect" | "fetchTopicMetadata">;
}

export interface KafkaEventSourceOptions {
  kafka: SourceKafkaClient;
  topic: string;
  groupId: string;
  offsetResetPolicy: OffsetResetPolicy;
  timestampPolicy: TimestampPolicy;
  partitionsConsumedConcurrently?: number;
  logger: Logger;
  clock?: Clock;
}

/**
 * Converts a fetched Kafka message into a RawEvent.
 */
export function toRawEvent(
  topic: string,
  partition: number,
  message: KafkaMessage,
  timestampPolicy: TimestampPolicy,
  clock: Clock,
): RawEvent {
  const logAppendTime = Number(message.timestamp);
  return {
    key: message.key ?? null,
    value: message.value ?? null,
    topic,
    partition,
    offset: message.offset,
    timestamp:
      timestampPolicy === "log-append-time" && Number.isFinite(logAppendTime) ?
        logAppendTime
      : clock.now(),
  };
}

/**
 * Reads a topic through a consumer group and commits offsets manually.
 *
 * Each partition's batches are handed over one at a time and the fetch loop
 * waits for the handler, so a slow pipeline slows fetching down.
 */
export class KafkaEventSource implements EventSource {
  readonly topic: string;
  private readonly options: KafkaEventSourceOptions;
  private readonly consumer: SourceConsumer;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private connected = false;
  private assigned = new Set<number>();

  constructor(options: KafkaEventSourceOptions) {
    this.options = options;
    this.topic = options.topic;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.consumer = options.kafka.consumer({
      groupId: options.groupId,
      sessionTimeout: SESSION_TIMEOUT_CONSUMER,
      heartbeatInterval: HEARTBEAT_INTERVAL_CONSUMER,
      retry: {
        retries: MAX_RETRIES_CONSUMER,
      },
    });
  }

  async partitionCount(): Promise<number> {
    const admin = this.options.kafka.admin();
    await admin.connect();
    try {
      const metadata = await admin.fetchTopicMetadata({ topics: [this.topic] });
      const topic = metadata.topics.find((t) => t.name === this.topic);
      if (!topic || topic.partitions.length === 0) {
        throw new TransientIOError(`Topic ${this.topic} has no partitions`);
      }
      return topic.partitions.length;
    } finally {
      await admin.disconnect();
    }
  }

  get assignedPartitions(): readonly number[] {
    return [...this.assigned].sort((a, b) => a - b);
  }

  async start(
    handler: PartitionBatchHandler,
    onFatal: (error: Error) => void,
    onRevoked: RevokedPartitionsHandler,
  ): Promise<void> {
    try {
      this.logger.log("Connecting consumer...");
      await this.consumer.connect();
      this.connected = true;
      this.logger.log("Consumer connected successfully");
    } catch (error) {
      this.logger.error("Failed to connect consumer:");
      if (error instanceof Error) {
        logError(this.logger, error);
      }
      throw error;
    }

    this.consumer.on(this.consumer.events.CRASH, (event) => {
      if (!event.payload.restart) {
        onFatal(event.payload.error);
      } else {
        this.logger.warn(
          `Consumer crashed and will restart: ${event.payload.error.message}`,
        );
      }
    });

    this.consumer.on(this.consumer.events.GROUP_JOIN, (event) => {
      const current = new Set(
        event.payload.memberAssignment[this.topic] ?? [],
      );
      const revoked = [...this.assigned]
        .filter((partition) => !current.has(partition))
        .sort((a, b) => a - b);
      this.assigned = current;
      this.logger.log(
        `Joined group '${event.payload.groupId}' with partitions [${this.assignedPartitions.join(", ")}]`,
      );
      if (revoked.length > 0) {
        this.logger.log(`Partitions [${revoked.join(", ")}] were revoked`);
        onRevoked(revoked);
      }
    });

    await this.consumer.subscribe({
      topics: [this.topic],
      fromBeginning: this.options.offsetResetPolicy === "earliest",
    });

    this.logger.log(
      `Starting consumer group '${this.options.groupId}' on ${this.topic} (offset reset: ${this.options.offsetResetPolicy})`,
    );

    await this.consumer.run({
      autoCommit: false,
      eachBatchAutoResolve: false,
      partitionsConsumedConcurrently:
        this.options.partitionsConsumedConcurrently ??
        DEFAULT_PARTITIONS_CONSUMED_CONCURRENTLY,
      eachBatch: async ({
        batch,
        heartbeat,
        pause,
        resolveOffset,
        isRunning,
        isStale,
      }) => {
        if (!isRunning() || isStale() || batch.messages.length === 0) {
          return;
        }

        const events = batch.messages.map((message) =>
          toRawEvent(
            batch.topic,
            batch.partition,
            message,
            this.options.timestampPolicy,
            this.clock,
          ),
        );

        try {
          const consumed = await handler({
            topic: batch.topic,
            partition: batch.partition,
            events,
            heartbeat,
            pause: () => {
              pause();
            },
          });
          if (consumed) {
            resolveOffset(batch.lastOffset());
          }
        } catch (error) {
          // Stop this partition; the pipeline decides what happens next
          pause();
          onFatal(error instanceof Error ? error : new Error(String(error)));
        }
      },
    });

    this.logger.log("Consumer is running...");
  }

  async commit(partition: number, offset: string): Promise<void> {
    await this.consumer.commitOffsets([
      { topic: this.topic, partition, offset },
    ]);
  }

  resume(partition: number): void {
    this.consumer.resume([{ topic: this.topic, partitions: [partition] }]);
  }

  async pause(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.logger.log("Pausing consumer...");
    this.consumer.pause([{ topic: this.topic }]);
  }

  async close(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    try {
      this.logger.log("Disconnecting consumer...");
      await this.consumer.disconnect();
      this.logger.log("Consumer is shutting down...");
    } catch (error) {
      this.logger.error(`Failed to disconnect consumer: ${error}`);
      throw error;
    }
  }
}
