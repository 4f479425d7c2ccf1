import { expect } from "chai";
import type {
  Consumer,
  ConsumerCrashEvent,
  ConsumerGroupJoinEvent,
  ConsumerRunConfig,
  EachBatchPayload,
  KafkaMessage,
  TopicPartitionOffsetAndMetadata,
} from "kafkajs";
import type { PartitionBatch } from "../src/source/eventSource";
import {
  KafkaEventSource,
  toRawEvent,
  type SourceConsumer,
} from "../src/source/kafkaEventSource";
import { createCapturingLogger, ManualClock } from "./helpers";

const TOPIC = "dbserver1.inventory.customers";
const GROUP = "cdc-ingest";

type Subscription =
  | [eventName: "consumer.crash", listener: (event: ConsumerCrashEvent) => void]
  | [
      eventName: "consumer.group_join",
      listener: (event: ConsumerGroupJoinEvent) => void,
    ];

/**
 * In-process consumer: the test pushes batches, crashes and rebalances.
 */
class StubConsumer implements SourceConsumer {
  readonly events = {
    CRASH: "consumer.crash",
    GROUP_JOIN: "consumer.group_join",
  } as const;
  readonly commits: TopicPartitionOffsetAndMetadata[] = [];
  readonly subscriptions: Parameters<Consumer["subscribe"]>[0][] = [];
  connected = false;
  disconnects = 0;
  runConfig: ConsumerRunConfig | undefined;
  private crashListener: ((event: ConsumerCrashEvent) => void) | undefined;
  private joinListener: ((event: ConsumerGroupJoinEvent) => void) | undefined;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
    this.connected = false;
  }

  async subscribe(subscription: Parameters<Consumer["subscribe"]>[0]): Promise<void> {
    this.subscriptions.push(subscription);
  }

  async run(config?: ConsumerRunConfig): Promise<void> {
    this.runConfig = config;
  }

  async commitOffsets(offsets: TopicPartitionOffsetAndMetadata[]): Promise<void> {
    this.commits.push(...offsets);
  }

  pause(): void {}

  resume(): void {}

  on(...subscription: Subscription): () => void {
    if (subscription[0] === "consumer.crash") {
      this.crashListener = subscription[1];
    } else {
      this.joinListener = subscription[1];
    }
    return () => {};
  }

  async deliver(payload: EachBatchPayload): Promise<void> {
    const eachBatch = this.runConfig?.eachBatch;
    if (!eachBatch) {
      throw new Error("consumer is not running");
    }
    await eachBatch(payload);
  }

  crash(error: Error, restart: boolean): void {
    this.crashListener?.({
      id: "1",
      type: this.events.CRASH,
      timestamp: 0,
      payload: { error, groupId: GROUP, restart },
    });
  }

  join(partitions: number[]): void {
    this.joinListener?.({
      id: "2",
      type: this.events.GROUP_JOIN,
      timestamp: 0,
      payload: {
        duration: 1,
        groupId: GROUP,
        isLeader: true,
        leaderId: "member-1",
        groupProtocol: "RoundRobinAssigner",
        memberId: "member-1",
        memberAssignment: { [TOPIC]: partitions },
      },
    });
  }
}

interface BatchCalls {
  resolved: string[];
  pauses: number;
}

const batchPayload = (
  partition: number,
  messages: KafkaMessage[],
  calls: BatchCalls,
): EachBatchPayload => ({
  batch: {
    topic: TOPIC,
    partition,
    highWatermark: "100",
    messages,
    isEmpty: () => messages.length === 0,
    firstOffset: () => messages[0]?.offset ?? null,
    lastOffset: () => messages[messages.length - 1].offset,
    offsetLag: () => "0",
    offsetLagLow: () => "0",
  },
  resolveOffset: (offset) => {
    calls.resolved.push(offset);
  },
  heartbeat: async () => {},
  pause: () => {
    calls.pauses++;
    return () => {};
  },
  commitOffsetsIfNecessary: async () => {},
  uncommittedOffsets: () => ({ topics: [] }),
  isRunning: () => true,
  isStale: () => false,
});

const message = (
  overrides: { key?: Buffer | null; value?: Buffer | null } = {},
): KafkaMessage => ({
  key: Buffer.from("1001"),
  value: Buffer.from([0, 0, 0, 0, 1]),
  timestamp: "1700000000000",
  attributes: 0,
  offset: "42",
  headers: {},
  ...overrides,
});

const messageAt = (offset: string): KafkaMessage => ({ ...message(), offset });

describe("KafkaEventSource", () => {
  describe("toRawEvent", () => {
    it("should stamp records with the processing time by default", () => {
      const event = toRawEvent(
        "dbserver1.inventory.customers",
        2,
        message(),
        "processing-time",
        new ManualClock(5000),
      );

      expect(event).to.deep.equal({
        key: Buffer.from("1001"),
        value: Buffer.from([0, 0, 0, 0, 1]),
        topic: "dbserver1.inventory.customers",
        partition: 2,
        offset: "42",
        timestamp: 5000,
      });
    });

    it("should use the broker timestamp under log-append-time", () => {
      const event = toRawEvent(
        "dbserver1.inventory.customers",
        0,
        message(),
        "log-append-time",
        new ManualClock(5000),
      );

      expect(event.timestamp).to.equal(1700000000000);
    });

    it("should keep tombstones as null values", () => {
      const event = toRawEvent(
        "dbserver1.inventory.customers",
        0,
        message({ value: null, key: null }),
        "processing-time",
        new ManualClock(),
      );

      expect(event.value).to.be.null;
      expect(event.key).to.be.null;
    });
  });
  describe("consuming", () => {
    let consumer: StubConsumer;
    let source: KafkaEventSource;
    let fatal: Error[];
    let revoked: number[][];
    let calls: BatchCalls;

    const start = (handler: (batch: PartitionBatch) => Promise<boolean>) =>
      source.start(
        handler,
        (error) => {
          fatal.push(error);
        },
        (partitions) => {
          revoked.push(partitions);
        },
      );

    beforeEach(() => {
      consumer = new StubConsumer();
      fatal = [];
      revoked = [];
      calls = { resolved: [], pauses: 0 };
      source = new KafkaEventSource({
        kafka: {
          consumer: () => consumer,
          admin: () => ({
            connect: async () => {},
            disconnect: async () => {},
            fetchTopicMetadata: async () => ({
              topics: [
                {
                  name: TOPIC,
                  partitions: [0, 1, 2].map((partitionId) => ({
                    partitionErrorCode: 0,
                    partitionId,
                    leader: 1,
                    replicas: [1],
                    isr: [1],
                  })),
                },
              ],
            }),
          }),
        },
        topic: TOPIC,
        groupId: GROUP,
        offsetResetPolicy: "earliest",
        timestampPolicy: "processing-time",
        logger: createCapturingLogger(),
        clock: new ManualClock(7000),
      });
    });

    it("should subscribe from the beginning without auto-commit", async () => {
      await start(async () => true);

      expect(consumer.connected).to.be.true;
      expect(consumer.subscriptions).to.deep.equal([
        { topics: [TOPIC], fromBeginning: true },
      ]);
      expect(consumer.runConfig?.autoCommit).to.be.false;
      expect(consumer.runConfig?.eachBatchAutoResolve).to.be.false;
    });

    it("should hand a batch over in log order and resolve it once consumed", async () => {
      const batches: PartitionBatch[] = [];
      await start(async (batch) => {
        batches.push(batch);
        return true;
      });

      await consumer.deliver(
        batchPayload(2, [messageAt("4"), messageAt("5")], calls),
      );

      expect(batches).to.have.lengthOf(1);
      expect(batches[0].partition).to.equal(2);
      expect(batches[0].events.map((e) => [e.offset, e.timestamp])).to.deep.equal([
        ["4", 7000],
        ["5", 7000],
      ]);
      expect(calls.resolved).to.deep.equal(["5"]);
    });

    it("should leave a batch unresolved when the pipeline does not consume it", async () => {
      await start(async () => false);

      await consumer.deliver(batchPayload(0, [messageAt("4")], calls));

      expect(calls.resolved).to.deep.equal([]);
      expect(fatal).to.deep.equal([]);
    });

    it("should pause the partition and report a handler failure as fatal", async () => {
      const failure = new Error("sink unavailable");
      await start(async () => {
        throw failure;
      });

      await consumer.deliver(batchPayload(0, [messageAt("4")], calls));

      expect(calls.pauses).to.equal(1);
      expect(calls.resolved).to.deep.equal([]);
      expect(fatal).to.deep.equal([failure]);
    });

    it("should escalate only crashes the client will not restart", async () => {
      await start(async () => true);
      const lost = new Error("broker connection lost");

      consumer.crash(new Error("retriable"), true);
      consumer.crash(lost, false);

      expect(fatal).to.deep.equal([lost]);
    });

    it("should report the partitions a rebalance took away", async () => {
      await start(async () => true);

      consumer.join([0, 1, 2]);
      consumer.join([2, 0]);

      expect(revoked).to.deep.equal([[1]]);
      expect(source.assignedPartitions).to.deep.equal([0, 2]);
    });

    it("should commit offsets for its own topic", async () => {
      await start(async () => true);

      await source.commit(1, "8");

      expect(consumer.commits).to.deep.equal([
        { topic: TOPIC, partition: 1, offset: "8" },
      ]);
    });

    it("should count the topic's partitions", async () => {
      expect(await source.partitionCount()).to.equal(3);
    });

    it("should disconnect only a connected consumer", async () => {
      await source.close();
      expect(consumer.disconnects).to.equal(0);

      await start(async () => true);
      await source.close();
      await source.close();

      expect(consumer.disconnects).to.equal(1);
      expect(consumer.connected).to.be.false;
    });
  });
});
