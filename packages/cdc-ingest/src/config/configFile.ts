import fs from "node:fs";
import path from "node:path";
import * as toml from "toml";
import { ConfigError, describeError } from "../errors";

export const CONFIG_FILE_NAME = "cdc.config.toml";

/**
 * Kafka section of cdc.config.toml
 */
export interface KafkaFileConfig {
  /** Broker connection string (e.g., "host:port" or comma-separated list) */
  bootstrap_servers?: string;
  topic?: string;
  group_id?: string;
  /** "earliest" or "latest" */
  offset_reset?: string;
  /** "processing-time" or "log-append-time" */
  timestamp_policy?: string;
  partitions_consumed_concurrently?: number;
  /** Security protocol (e.g., "SASL_SSL", "PLAINTEXT") */
  security_protocol?: string;
  /** SASL mechanism (e.g., "PLAIN", "SCRAM-SHA-256") */
  sasl_mechanism?: string;
  sasl_username?: string;
  sasl_password?: string;
}

export interface RegistryFileConfig {
  url?: string;
}

export interface WindowFileConfig {
  size_seconds?: number;
  allowed_lateness_ms?: number;
  late_policy?: string;
  late_topic?: string;
}

export interface SinkFileConfig {
  /** Selects the file sink when set */
  output_path?: string;
  project?: string;
  dataset?: string;
  table?: string;
}

export interface PipelineFileConfig {
  drain_policy?: string;
  watermark_interval_ms?: number;
  max_buffered_records?: number;
  decode_concurrency?: number;
}

export interface ClickHouseFileConfig {
  host?: string;
  host_port?: number;
  user?: string;
  password?: string;
  use_ssl?: boolean;
}

/**
 * Contents of cdc.config.toml. Every section and key is optional.
 */
export interface CdcConfigFile {
  kafka: KafkaFileConfig;
  registry: RegistryFileConfig;
  window: WindowFileConfig;
  sink: SinkFileConfig;
  pipeline: PipelineFileConfig;
  clickhouse: ClickHouseFileConfig;
}

type ValueKind = "string" | "number" | "boolean";

const isTable = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Date);

/**
 * Reads typed keys out of one [section], rejecting mistyped values.
 */
class SectionReader {
  private readonly name: string;
  private readonly table: Record<string, unknown>;

  constructor(root: Record<string, unknown>, name: string) {
    const section = root[name];
    this.name = name;
    if (section === undefined) {
      this.table = {};
    } else if (isTable(section)) {
      this.table = section;
    } else {
      throw new ConfigError(`[${name}] in ${CONFIG_FILE_NAME} must be a table`);
    }
  }

  string(key: string): string | undefined {
    return this.read(key, "string", (v): v is string => typeof v === "string");
  }

  number(key: string): number | undefined {
    return this.read(key, "number", (v): v is number => typeof v === "number");
  }

  boolean(key: string): boolean | undefined {
    return this.read(
      key,
      "boolean",
      (v): v is boolean => typeof v === "boolean",
    );
  }

  private read<T>(
    key: string,
    kind: ValueKind,
    guard: (value: unknown) => value is T,
  ): T | undefined {
    const value = this.table[key];
    if (value === undefined) {
      return undefined;
    }
    if (!guard(value)) {
      throw new ConfigError(
        `${this.name}.${key} in ${CONFIG_FILE_NAME} must be a ${kind}`,
      );
    }
    return value;
  }
}

/**
 * Validates parsed TOML against the config file layout.
 */
export function parseConfigFile(content: string): CdcConfigFile {
  let parsed: unknown;
  try {
    parsed = toml.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${CONFIG_FILE_NAME}: ${describeError(error)}`,
      { cause: error },
    );
  }
  if (!isTable(parsed)) {
    throw new ConfigError(`${CONFIG_FILE_NAME} must contain a table`);
  }

  const kafka = new SectionReader(parsed, "kafka");
  const registry = new SectionReader(parsed, "registry");
  const window = new SectionReader(parsed, "window");
  const sink = new SectionReader(parsed, "sink");
  const pipeline = new SectionReader(parsed, "pipeline");
  const clickhouse = new SectionReader(parsed, "clickhouse");

  return {
    kafka: {
      bootstrap_servers: kafka.string("bootstrap_servers"),
      topic: kafka.string("topic"),
      group_id: kafka.string("group_id"),
      offset_reset: kafka.string("offset_reset"),
      timestamp_policy: kafka.string("timestamp_policy"),
      partitions_consumed_concurrently: kafka.number(
        "partitions_consumed_concurrently",
      ),
      security_protocol: kafka.string("security_protocol"),
      sasl_mechanism: kafka.string("sasl_mechanism"),
      sasl_username: kafka.string("sasl_username"),
      sasl_password: kafka.string("sasl_password"),
    },
    registry: { url: registry.string("url") },
    window: {
      size_seconds: window.number("size_seconds"),
      allowed_lateness_ms: window.number("allowed_lateness_ms"),
      late_policy: window.string("late_policy"),
      late_topic: window.string("late_topic"),
    },
    sink: {
      output_path: sink.string("output_path"),
      project: sink.string("project"),
      dataset: sink.string("dataset"),
      table: sink.string("table"),
    },
    pipeline: {
      drain_policy: pipeline.string("drain_policy"),
      watermark_interval_ms: pipeline.number("watermark_interval_ms"),
      max_buffered_records: pipeline.number("max_buffered_records"),
      decode_concurrency: pipeline.number("decode_concurrency"),
    },
    clickhouse: {
      host: clickhouse.string("host"),
      host_port: clickhouse.number("host_port"),
      user: clickhouse.string("user"),
      password: clickhouse.string("password"),
      use_ssl: clickhouse.boolean("use_ssl"),
    },
  };
}

/**
 * Walks up the directory tree to find cdc.config.toml
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root directory
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Reads cdc.config.toml from `startDir` or its nearest ancestor. The file is
 * optional; null means none was found.
 */
export async function readConfigFile(
  startDir?: string,
): Promise<CdcConfigFile | null> {
  const configPath = findConfigFile(startDir);
  if (!configPath) {
    return null;
  }

  let content: string;
  try {
    content = await fs.promises.readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${configPath}: ${describeError(error)}`,
      { cause: error },
    );
  }
  return parseConfigFile(content);
}
