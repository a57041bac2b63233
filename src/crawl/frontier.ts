/**
 * FIFO frontier for level-order traversal. No dedup: the same record may be
 * queued again through a different parent.
 */
import type { CrawlRecord, PlacedRecord } from './types.js';

export class NodeFrontier<R extends CrawlRecord> {
  private queue: PlacedRecord<R>[] = [];
  private head = 0;
  private dequeued = 0;

  constructor(seeds: readonly PlacedRecord<R>[] = []) {
    this.addAll(seeds);
  }

  add(entry: PlacedRecord<R>): void {
    this.queue.push(entry);
  }

  /** Append entries at the back, preserving their relative order. */
  addAll(entries: readonly PlacedRecord<R>[]): void {
    for (const entry of entries) this.add(entry);
  }

  /** Front entry, or null once the frontier is drained. */
  next(): PlacedRecord<R> | null {
    if (this.head >= this.queue.length) return null;
    const entry = this.queue[this.head++];
    this.dequeued++;

    // Compact consumed slots so long crawls don't keep every entry alive
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    return entry;
  }

  get pendingCount(): number {
    return this.queue.length - this.head;
  }

  /** Number of entries that have been dequeued. */
  get processedCount(): number {
    return this.dequeued;
  }
}
