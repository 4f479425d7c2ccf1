import type { Logger } from "../commons";
import { FileSink } from "./fileSink";
import {
  TableSink,
  type TableReference,
  type WarehouseClient,
} from "./tableSink";
import type { WindowSink } from "./types";

/**
 * The single destination of a pipeline, chosen once from configuration.
 */
export type SinkSelection =
  | { kind: "table"; table: TableReference }
  | { kind: "file"; outputPath: string };

/**
 * A set output path selects the file sink; otherwise rows go to the table.
 */
export function resolveSinkSelection(
  outputPath: string | undefined,
  table: TableReference,
): SinkSelection {
  return outputPath !== undefined && outputPath.trim() !== "" ?
      { kind: "file", outputPath }
    : { kind: "table", table };
}

export interface SinkDependencies {
  logger: Logger;
  /** Shard count for file output */
  numShards: number;
  createWarehouse: (table: TableReference) => WarehouseClient;
}

export function createWindowSink(
  selection: SinkSelection,
  deps: SinkDependencies,
): WindowSink {
  switch (selection.kind) {
    case "table":
      return new TableSink({
        table: selection.table,
        warehouse: deps.createWarehouse(selection.table),
        logger: deps.logger,
      });
    case "file":
      return new FileSink({
        outputPath: selection.outputPath,
        numShards: deps.numShards,
        logger: deps.logger,
      });
  }
}

export const describeSinkSelection = (selection: SinkSelection): string => {
  switch (selection.kind) {
    case "table":
      return `table ${selection.table.projectId}:${selection.table.datasetId}.${selection.table.tableId}`;
    case "file":
      return `file ${selection.outputPath}`;
  }
};
