import { WindowStateError } from "../errors";

export const DEFAULT_WINDOW_SIZE_SECONDS = 2;

/**
 * What happens to a record whose window has already closed.
 * - `drop`: discard it, counted and logged
 * - `dead-letter`: hand it to the late-record output
 */
export type LatePolicy = "drop" | "dead-letter";

export type WindowState = "open" | "closed" | "flushed" | "discarded";

/** Half-open interval [start, end) in epoch milliseconds */
export interface WindowBounds {
  start: number;
  end: number;
}

const TRANSITIONS: Record<WindowState, readonly WindowState[]> = {
  open: ["closed"],
  closed: ["flushed", "discarded"],
  flushed: ["discarded"],
  discarded: [],
};

export function windowStartFor(timestampMs: number, sizeMs: number): number {
  return Math.floor(timestampMs / sizeMs) * sizeMs;
}

export function windowFor(timestampMs: number, sizeMs: number): WindowBounds {
  const start = windowStartFor(timestampMs, sizeMs);
  return { start, end: start + sizeMs };
}

export const formatWindow = ({ start, end }: WindowBounds): string =>
  `[${new Date(start).toISOString()}, ${new Date(end).toISOString()})`;

/**
 * A fixed window and the items assigned to it. State only moves forward:
 * open -> closed -> flushed -> discarded (closed may skip to discarded).
 */
export class Window<T> {
  readonly bounds: WindowBounds;
  private _state: WindowState = "open";
  private _items: T[] = [];

  constructor(bounds: WindowBounds) {
    this.bounds = bounds;
  }

  get state(): WindowState {
    return this._state;
  }

  get items(): readonly T[] {
    return this._items;
  }

  add(item: T): void {
    if (this._state !== "open") {
      throw new WindowStateError(
        `Cannot add to ${this._state} window ${formatWindow(this.bounds)}`,
      );
    }
    this._items.push(item);
  }

  close(): void {
    this.transition("closed");
  }

  markFlushed(): void {
    this.transition("flushed");
  }

  discard(): void {
    this.transition("discarded");
    this._items = [];
  }

  private transition(next: WindowState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new WindowStateError(
        `Window ${formatWindow(this.bounds)} cannot move from ${this._state} to ${next}`,
      );
    }
    this._state = next;
  }
}

export interface FixedWindowAssignerOptions {
  sizeMs: number;
  allowedLatenessMs?: number;
}

export type Assignment<T> =
  | { kind: "assigned"; window: Window<T> }
  | { kind: "late"; bounds: WindowBounds };

/**
 * Assigns items to fixed, non-overlapping windows of `sizeMs` and closes
 * them as the watermark passes `end + allowedLatenessMs`.
 */
export class FixedWindowAssigner<T> {
  readonly sizeMs: number;
  readonly allowedLatenessMs: number;
  private readonly open = new Map<number, Window<T>>();
  private watermark = Number.NEGATIVE_INFINITY;

  constructor(options: FixedWindowAssignerOptions) {
    if (!(options.sizeMs > 0)) {
      throw new RangeError(`Window size must be positive, got ${options.sizeMs}`);
    }
    const lateness = options.allowedLatenessMs ?? 0;
    if (lateness < 0) {
      throw new RangeError(`Allowed lateness must not be negative, got ${lateness}`);
    }
    this.sizeMs = options.sizeMs;
    this.allowedLatenessMs = lateness;
  }

  get currentWatermark(): number {
    return this.watermark;
  }

  get openWindowCount(): number {
    return this.open.size;
  }

  get bufferedCount(): number {
    let count = 0;
    for (const window of this.open.values()) {
      count += window.items.length;
    }
    return count;
  }

  assign(timestampMs: number, item: T): Assignment<T> {
    const bounds = windowFor(timestampMs, this.sizeMs);
    if (this.isExpired(bounds)) {
      return { kind: "late", bounds };
    }

    let window = this.open.get(bounds.start);
    if (!window) {
      window = new Window<T>(bounds);
      this.open.set(bounds.start, window);
    }
    window.add(item);
    return { kind: "assigned", window };
  }

  /**
   * Moves the watermark forward (it never moves back) and returns the
   * windows it closed, oldest first.
   */
  advanceWatermark(watermarkMs: number): Window<T>[] {
    if (watermarkMs > this.watermark) {
      this.watermark = watermarkMs;
    }
    return this.closeWhere((window) => this.isExpired(window.bounds));
  }

  /**
   * Closes every open window. Nothing can be assigned afterwards.
   */
  closeAll(): Window<T>[] {
    this.watermark = Number.POSITIVE_INFINITY;
    return this.closeWhere(() => true);
  }

  private isExpired(bounds: WindowBounds): boolean {
    return bounds.end + this.allowedLatenessMs <= this.watermark;
  }

  private closeWhere(predicate: (window: Window<T>) => boolean): Window<T>[] {
    const closed: Window<T>[] = [];
    for (const [start, window] of this.open) {
      if (predicate(window)) {
        window.close();
        closed.push(window);
        this.open.delete(start);
      }
    }
    return closed.sort((a, b) => a.bounds.start - b.bounds.start);
  }
}
