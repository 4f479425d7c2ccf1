export * from "./errors";
export {
  createLogger,
  logError,
  getKafkaClient,
  getClickhouseClient,
  parseBrokerString,
  systemClock,
} from "./commons";
export type {
  Logger,
  Clock,
  KafkaClientConfig,
  ClickHouseConnectionConfig,
} from "./commons";
export * from "./model";

export { frame, unframe } from "./decoder/wireFormat";
export { SchemaCache } from "./decoder/schemaCache";
export {
  SchemaRegistryClient,
  DEFAULT_SCHEMA_REGISTRY_URL,
} from "./decoder/schemaRegistryClient";
export type {
  RegisteredSchema,
  RegistryFetch,
} from "./decoder/schemaRegistryClient";
export {
  SchemaRegistryDecoder,
  createAvroType,
  toDecodedRecord,
} from "./decoder/decoder";
export type { RecordDecoder } from "./decoder/decoder";

export {
  FixedWindowAssigner,
  Window,
  windowFor,
  windowStartFor,
  formatWindow,
  DEFAULT_WINDOW_SIZE_SECONDS,
} from "./windowing/fixedWindows";
export type {
  LatePolicy,
  WindowBounds,
  WindowState,
} from "./windowing/fixedWindows";

export { projectRow, parseRow } from "./projection/rowProjector";

export { KafkaEventSource, toRawEvent } from "./source/kafkaEventSource";
export { OffsetLedger } from "./source/offsetLedger";
export type {
  EventSource,
  OffsetResetPolicy,
  TimestampPolicy,
  PartitionBatch,
  RevokedPartitionsHandler,
} from "./source/eventSource";
export type {
  SourceConsumer,
  SourceKafkaClient,
} from "./source/kafkaEventSource";

export {
  TableSink,
  clickhouseWarehouse,
  createTableStatement,
  DEFAULT_TABLE_REFERENCE,
} from "./sinks/tableSink";
export type { TableReference, WarehouseClient } from "./sinks/tableSink";
export { FileSink, readWindowFile, windowFileName } from "./sinks/fileSink";
export {
  createWindowSink,
  resolveSinkSelection,
} from "./sinks/sinkRouter";
export type { SinkSelection } from "./sinks/sinkRouter";
export type { WindowBatch, WindowSink } from "./sinks/types";

export { PartitionWorker } from "./pipeline/partitionWorker";
export type { DrainPolicy } from "./pipeline/partitionWorker";
export { DeadLetterLateOutput } from "./pipeline/lateOutput";
export type { LateRecord, LateRecordOutput } from "./pipeline/lateOutput";
export { CdcPipeline, startPipeline, runCdcPipeline } from "./pipeline/runner";
export type { PipelineControl, PipelineSettings } from "./pipeline/runner";

export {
  loadPipelineOptions,
  resolvePipelineOptions,
} from "./config/runtime";
export type { PipelineOptions, PipelineOverrides } from "./config/runtime";
export { readConfigFile, parseConfigFile } from "./config/configFile";
