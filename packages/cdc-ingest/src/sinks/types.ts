import type { Row } from "../model";
import type { WindowBounds } from "../windowing/fixedWindows";

/**
 * The rows of one fired window from one partition. Row order is unspecified.
 */
export interface WindowBatch {
  window: WindowBounds;
  partition: number;
  rows: readonly Row[];
}

export interface WindowSink {
  readonly kind: "table" | "file";
  /** Prepares the destination; called once before the first write */
  open: () => Promise<void>;
  write: (batch: WindowBatch) => Promise<void>;
  close: () => Promise<void>;
}
