import type { Producer } from "kafkajs";
import type { Logger } from "../commons";
import { toJsonRow, type Row } from "../model";
import { formatWindow, type WindowBounds } from "../windowing/fixedWindows";

export interface LateRecord {
  row: Row;
  window: WindowBounds;
  topic: string;
  partition: number;
  offset: string;
  timestamp: number;
}

/**
 * Explicit destination for records whose window already closed.
 */
export interface LateRecordOutput {
  send: (record: LateRecord) => Promise<void>;
  close: () => Promise<void>;
}

export type DeadLetterProducer = Pick<Producer, "send" | "disconnect">;

/**
 * Builds the dead-letter payload for a late record.
 */
export function buildDeadLetterRecord(record: LateRecord, failedAt: Date) {
  return {
    originalRecord: {
      ...toJsonRow(record.row),
      // Include original Kafka message metadata
      __sourceTopic: record.topic,
      __sourcePartition: record.partition,
      __sourceOffset: record.offset,
      __sourceTimestamp: record.timestamp,
    },
    errorMessage: `Record arrived after window ${formatWindow(record.window)} closed`,
    errorType: "LateRecord",
    failedAt,
    source: "windowing",
  };
}

/**
 * Publishes late records to a dead-letter topic.
 */
export class DeadLetterLateOutput implements LateRecordOutput {
  private readonly producer: DeadLetterProducer;
  private readonly topic: string;
  private readonly logger: Logger;

  constructor(producer: DeadLetterProducer, topic: string, logger: Logger) {
    this.producer = producer;
    this.topic = topic;
    this.logger = logger;
  }

  async send(record: LateRecord): Promise<void> {
    await this.producer.send({
      topic: this.topic,
      messages: [
        {
          key: String(record.row.id),
          value: JSON.stringify(buildDeadLetterRecord(record, new Date())),
        },
      ],
    });
    this.logger.log(
      `Sent late record (offset ${record.offset}, partition ${record.partition}) to DLQ ${this.topic}`,
    );
  }

  async close(): Promise<void> {
    await this.producer.disconnect();
    this.logger.log("Producer is shutting down...");
  }
}
