/**
 * Tracks which offsets of one partition are safe to commit.
 *
 * Offsets of records that sit in a window not yet flushed are pending; the
 * committable offset never passes the oldest of them, so a restart replays
 * every record whose window was not written.
 */
export class OffsetLedger {
  // window start -> first (lowest) pending offset assigned to that window
  private readonly pendingByWindow = new Map<number, bigint>();
  private nextOffset: bigint | undefined;
  private committed: bigint | undefined;

  /** Records an offset that now waits on the window starting at `windowStart`. */
  track(windowStart: number, offset: string): void {
    const value = BigInt(offset);
    const current = this.pendingByWindow.get(windowStart);
    if (current === undefined || value < current) {
      this.pendingByWindow.set(windowStart, value);
    }
    this.observe(offset);
  }

  /** Records an offset that was fully handled without entering a window. */
  observe(offset: string): void {
    const next = BigInt(offset) + 1n;
    if (this.nextOffset === undefined || next > this.nextOffset) {
      this.nextOffset = next;
    }
  }

  /** Releases the offsets held by a flushed window. */
  release(windowStart: number): void {
    this.pendingByWindow.delete(windowStart);
  }

  get pendingWindows(): number {
    return this.pendingByWindow.size;
  }

  /**
   * The offset to commit (the next one to read), or undefined when it has
   * not moved past the last commit.
   */
  committable(): string | undefined {
    let candidate = this.nextOffset;
    for (const pending of this.pendingByWindow.values()) {
      if (candidate === undefined || pending < candidate) {
        candidate = pending;
      }
    }
    if (
      candidate === undefined ||
      (this.committed !== undefined && candidate <= this.committed)
    ) {
      return undefined;
    }
    return candidate.toString();
  }

  markCommitted(offset: string): void {
    const value = BigInt(offset);
    if (this.committed === undefined || value > this.committed) {
      this.committed = value;
    }
  }
}
