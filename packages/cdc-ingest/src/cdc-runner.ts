#!/usr/bin/env node

import process from "process";
import { Command } from "commander";
import { createLogger, logError } from "./commons";
import { loadPipelineOptions, type PipelineOverrides } from "./config/runtime";
import { runCdcPipeline } from "./pipeline/runner";

const program = new Command();

program
  .name("cdc-runner")
  .description("Change-data-capture ingestion from Kafka into windowed sinks")
  .version("1.0.0");

program
  .command("run")
  .description(
    "Consume the change topic, window records by processing time and write each fired window",
  )
  .option("--topic <topic>", "Source topic")
  .option("--group-id <group-id>", "Kafka consumer group")
  .option(
    "--bootstrap-servers <servers>",
    "Kafka broker address(es) - comma-separated for multiple brokers (e.g., 'broker1:9092, broker2:9092'). Whitespace around commas is automatically trimmed.",
  )
  .option("--offset-reset <policy>", "Where a new group starts: earliest or latest")
  .option(
    "--timestamp-policy <policy>",
    "Record timestamp: processing-time or log-append-time",
  )
  .option("--schema-registry-url <url>", "Schema registry base URL")
  .option("--window-size <seconds>", "Fixed window size in seconds")
  .option("--allowed-lateness <ms>", "How long a window stays open after its end")
  .option("--late-policy <policy>", "Late records: drop or dead-letter")
  .option("--late-topic <topic>", "Dead-letter topic for late records")
  .option("--drain-policy <policy>", "Open windows at shutdown: flush or discard")
  .option("--output <path>", "Write windowed files under this path prefix")
  .option("--project <project>", "Warehouse project")
  .option("--dataset <dataset>", "Warehouse dataset (ClickHouse database)")
  .option("--table <table>", "Warehouse table")
  .action(async (overrides: PipelineOverrides) => {
    const logger = createLogger("cdc-runner");
    const options = await loadPipelineOptions(overrides);
    const control = await runCdcPipeline(options);

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.log(`Received ${signal}, shutting down...`);
      control.stop().catch((error: unknown) => {
        logger.error(`Shutdown failed: ${String(error)}`);
      });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    await control.done;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const logger = createLogger("cdc-runner");
  if (error instanceof Error) {
    logError(logger, error);
  } else {
    logger.error(String(error));
  }
  process.exit(1);
});
