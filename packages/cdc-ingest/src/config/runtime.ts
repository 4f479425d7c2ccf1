import {
  parseBrokerString,
  type ClickHouseConnectionConfig,
} from "../commons";
import { DEFAULT_SCHEMA_REGISTRY_URL } from "../decoder/schemaRegistryClient";
import { ConfigError } from "../errors";
import {
  DEFAULT_DECODE_CONCURRENCY,
  type DrainPolicy,
} from "../pipeline/partitionWorker";
import {
  DEFAULT_TABLE_REFERENCE,
  type TableReference,
} from "../sinks/tableSink";
import { resolveSinkSelection, type SinkSelection } from "../sinks/sinkRouter";
import { DEFAULT_PARTITIONS_CONSUMED_CONCURRENTLY } from "../source/kafkaEventSource";
import type { OffsetResetPolicy, TimestampPolicy } from "../source/eventSource";
import {
  DEFAULT_WINDOW_SIZE_SECONDS,
  type LatePolicy,
} from "../windowing/fixedWindows";
import { readConfigFile, type CdcConfigFile } from "./configFile";

export interface KafkaSecurityConfig {
  securityProtocol?: string;
  saslMechanism?: string;
  saslUsername?: string;
  saslPassword?: string;
}

/**
 * Fully resolved settings of one pipeline run.
 */
export interface PipelineOptions {
  topic: string;
  groupId: string;
  bootstrapServers: string;
  offsetResetPolicy: OffsetResetPolicy;
  timestampPolicy: TimestampPolicy;
  partitionsConsumedConcurrently: number;
  kafkaSecurity: KafkaSecurityConfig;
  schemaRegistryUrl: string;
  windowSizeSeconds: number;
  allowedLatenessMs: number;
  latePolicy: LatePolicy;
  lateTopic: string;
  drainPolicy: DrainPolicy;
  watermarkIntervalMs: number;
  maxBufferedRecords: number;
  decodeConcurrency: number;
  sink: SinkSelection;
  clickhouse: ClickHouseConnectionConfig;
}

/**
 * Values given on the command line. They win over every other source.
 */
export interface PipelineOverrides {
  topic?: string;
  groupId?: string;
  bootstrapServers?: string;
  offsetReset?: string;
  timestampPolicy?: string;
  schemaRegistryUrl?: string;
  windowSize?: string;
  allowedLateness?: string;
  latePolicy?: string;
  lateTopic?: string;
  drainPolicy?: string;
  output?: string;
  project?: string;
  dataset?: string;
  table?: string;
}

export const DEFAULT_TOPIC = "dbserver1.inventory.customers";
export const DEFAULT_GROUP_ID = "cdc-ingest";
export const DEFAULT_BOOTSTRAP_SERVERS = "localhost:9092";
export const DEFAULT_WATERMARK_INTERVAL_MS = 500;
export const DEFAULT_MAX_BUFFERED_RECORDS = 100_000;

const CLICKHOUSE_DEFAULTS: ClickHouseConnectionConfig = {
  host: "localhost",
  port: "18123",
  username: "default",
  password: "",
  useSSL: false,
};

type Env = Record<string, string | undefined>;
type FileValue = string | number | boolean | undefined;

const _trimmed = (value: string | undefined): string | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const _parseBool = (name: string, value: string): boolean => {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      throw new ConfigError(`${name} must be a boolean, got '${value}'`);
  }
};

const parseNumber = (
  name: string,
  value: string,
  check: (n: number) => boolean,
  expected: string,
): number => {
  const parsed = Number(value);
  if (value.trim() === "" || !check(parsed)) {
    throw new ConfigError(`${name} must be ${expected}, got '${value}'`);
  }
  return parsed;
};

const positiveNumber = (name: string, value: string): number =>
  parseNumber(name, value, (n) => Number.isFinite(n) && n > 0, "a positive number");

const positiveInteger = (name: string, value: string): number =>
  parseNumber(
    name,
    value,
    (n) => Number.isSafeInteger(n) && n > 0,
    "a positive integer",
  );

const nonNegativeInteger = (name: string, value: string): number =>
  parseNumber(
    name,
    value,
    (n) => Number.isSafeInteger(n) && n >= 0,
    "a non-negative integer",
  );

const choice = <T extends string>(
  name: string,
  value: string,
  allowed: readonly T[],
): T => {
  const match = allowed.find((candidate) => candidate === value.trim().toLowerCase());
  if (match === undefined) {
    throw new ConfigError(
      `${name} must be one of ${allowed.join(", ")}, got '${value}'`,
    );
  }
  return match;
};

const httpUrl = (name: string, value: string): string => {
  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw new ConfigError(`${name} is not a valid URL: '${value}'`, {
      cause: error,
    });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`${name} must be an http(s) URL, got '${value}'`);
  }
  return value;
};

export interface ResolvePipelineOptionsInput {
  overrides?: PipelineOverrides;
  env?: Env;
  file?: CdcConfigFile | null;
}

/**
 * Layers CLI overrides over environment variables over the config file over
 * built-in defaults, and validates the result.
 *
 * @throws ConfigError on any invalid value
 */
export function resolvePipelineOptions({
  overrides = {},
  env = {},
  file,
}: ResolvePipelineOptionsInput): PipelineOptions {
  const setting = (
    override: string | undefined,
    envName: string,
    fileValue: FileValue,
  ): string | undefined =>
    _trimmed(override) ??
    _trimmed(env[envName]) ??
    (fileValue === undefined ? undefined : _trimmed(String(fileValue)));

  const topic = setting(overrides.topic, "CDC_TOPIC", file?.kafka.topic) ?? DEFAULT_TOPIC;

  const bootstrapServers =
    setting(
      overrides.bootstrapServers,
      "CDC_BOOTSTRAP_SERVERS",
      file?.kafka.bootstrap_servers,
    ) ?? DEFAULT_BOOTSTRAP_SERVERS;
  if (parseBrokerString(bootstrapServers).length === 0) {
    throw new ConfigError(
      `bootstrapServers has no broker addresses: '${bootstrapServers}'`,
    );
  }

  const offsetReset = setting(
    overrides.offsetReset,
    "CDC_OFFSET_RESET",
    file?.kafka.offset_reset,
  );
  const timestampPolicy = setting(
    overrides.timestampPolicy,
    "CDC_TIMESTAMP_POLICY",
    file?.kafka.timestamp_policy,
  );
  const partitionsConcurrency = setting(
    undefined,
    "CDC_PARTITIONS_CONSUMED_CONCURRENTLY",
    file?.kafka.partitions_consumed_concurrently,
  );
  const schemaRegistryUrl = setting(
    overrides.schemaRegistryUrl,
    "CDC_SCHEMA_REGISTRY_URL",
    file?.registry.url,
  );
  const windowSize = setting(
    overrides.windowSize,
    "CDC_WINDOW_SIZE_SECONDS",
    file?.window.size_seconds,
  );
  const allowedLateness = setting(
    overrides.allowedLateness,
    "CDC_ALLOWED_LATENESS_MS",
    file?.window.allowed_lateness_ms,
  );
  const latePolicy = setting(
    overrides.latePolicy,
    "CDC_LATE_POLICY",
    file?.window.late_policy,
  );
  const drainPolicy = setting(
    overrides.drainPolicy,
    "CDC_DRAIN_POLICY",
    file?.pipeline.drain_policy,
  );
  const watermarkInterval = setting(
    undefined,
    "CDC_WATERMARK_INTERVAL_MS",
    file?.pipeline.watermark_interval_ms,
  );
  const maxBuffered = setting(
    undefined,
    "CDC_MAX_BUFFERED_RECORDS",
    file?.pipeline.max_buffered_records,
  );
  const decodeConcurrency = setting(
    undefined,
    "CDC_DECODE_CONCURRENCY",
    file?.pipeline.decode_concurrency,
  );

  const table: TableReference = {
    projectId:
      setting(overrides.project, "CDC_TABLE_PROJECT", file?.sink.project) ??
      DEFAULT_TABLE_REFERENCE.projectId,
    datasetId:
      setting(overrides.dataset, "CDC_TABLE_DATASET", file?.sink.dataset) ??
      DEFAULT_TABLE_REFERENCE.datasetId,
    tableId:
      setting(overrides.table, "CDC_TABLE_NAME", file?.sink.table) ??
      DEFAULT_TABLE_REFERENCE.tableId,
  };

  const useSSL = setting(
    undefined,
    "CDC_CLICKHOUSE_USE_SSL",
    file?.clickhouse.use_ssl,
  );
  const clickhousePort =
    setting(undefined, "CDC_CLICKHOUSE_PORT", file?.clickhouse.host_port) ??
    CLICKHOUSE_DEFAULTS.port;
  positiveInteger("clickhouse port", clickhousePort);

  return {
    topic,
    groupId:
      setting(overrides.groupId, "CDC_GROUP_ID", file?.kafka.group_id) ??
      DEFAULT_GROUP_ID,
    bootstrapServers,
    offsetResetPolicy:
      offsetReset === undefined ? "earliest" : (
        choice("offsetResetPolicy", offsetReset, ["earliest", "latest"])
      ),
    timestampPolicy:
      timestampPolicy === undefined ? "processing-time" : (
        choice("timestampPolicy", timestampPolicy, [
          "processing-time",
          "log-append-time",
        ])
      ),
    partitionsConsumedConcurrently:
      partitionsConcurrency === undefined ?
        DEFAULT_PARTITIONS_CONSUMED_CONCURRENTLY
      : positiveInteger("partitionsConsumedConcurrently", partitionsConcurrency),
    kafkaSecurity: {
      securityProtocol: setting(
        undefined,
        "CDC_KAFKA_SECURITY_PROTOCOL",
        file?.kafka.security_protocol,
      ),
      saslMechanism: setting(
        undefined,
        "CDC_KAFKA_SASL_MECHANISM",
        file?.kafka.sasl_mechanism,
      ),
      saslUsername: setting(
        undefined,
        "CDC_KAFKA_SASL_USERNAME",
        file?.kafka.sasl_username,
      ),
      saslPassword: setting(
        undefined,
        "CDC_KAFKA_SASL_PASSWORD",
        file?.kafka.sasl_password,
      ),
    },
    schemaRegistryUrl: httpUrl(
      "schemaRegistryUrl",
      schemaRegistryUrl ?? DEFAULT_SCHEMA_REGISTRY_URL,
    ),
    windowSizeSeconds:
      windowSize === undefined ?
        DEFAULT_WINDOW_SIZE_SECONDS
      : positiveNumber("windowSizeSeconds", windowSize),
    allowedLatenessMs:
      allowedLateness === undefined ? 0 : (
        nonNegativeInteger("allowedLatenessMs", allowedLateness)
      ),
    latePolicy:
      latePolicy === undefined ? "drop" : (
        choice("latePolicy", latePolicy, ["drop", "dead-letter"])
      ),
    lateTopic:
      setting(overrides.lateTopic, "CDC_LATE_TOPIC", file?.window.late_topic) ??
      `${topic}.late`,
    drainPolicy:
      drainPolicy === undefined ? "flush" : (
        choice("drainPolicy", drainPolicy, ["flush", "discard"])
      ),
    watermarkIntervalMs:
      watermarkInterval === undefined ?
        DEFAULT_WATERMARK_INTERVAL_MS
      : positiveInteger("watermarkIntervalMs", watermarkInterval),
    maxBufferedRecords:
      maxBuffered === undefined ?
        DEFAULT_MAX_BUFFERED_RECORDS
      : positiveInteger("maxBufferedRecords", maxBuffered),
    decodeConcurrency:
      decodeConcurrency === undefined ?
        DEFAULT_DECODE_CONCURRENCY
      : positiveInteger("decodeConcurrency", decodeConcurrency),
    sink: resolveSinkSelection(
      setting(overrides.output, "CDC_OUTPUT_PATH", file?.sink.output_path),
      table,
    ),
    clickhouse: {
      host:
        setting(undefined, "CDC_CLICKHOUSE_HOST", file?.clickhouse.host) ??
        CLICKHOUSE_DEFAULTS.host,
      port: clickhousePort,
      username:
        setting(undefined, "CDC_CLICKHOUSE_USER", file?.clickhouse.user) ??
        CLICKHOUSE_DEFAULTS.username,
      password:
        setting(
          undefined,
          "CDC_CLICKHOUSE_PASSWORD",
          file?.clickhouse.password,
        ) ?? CLICKHOUSE_DEFAULTS.password,
      useSSL:
        useSSL === undefined ?
          CLICKHOUSE_DEFAULTS.useSSL
        : _parseBool("CDC_CLICKHOUSE_USE_SSL", useSSL),
    },
  };
}

/**
 * Resolves options for this process: CLI overrides, then `process.env`,
 * then the nearest cdc.config.toml.
 */
export async function loadPipelineOptions(
  overrides: PipelineOverrides = {},
  startDir?: string,
): Promise<PipelineOptions> {
  const file = await readConfigFile(startDir);
  return resolvePipelineOptions({ overrides, env: process.env, file });
}
