import { describeInvalidIdentifier, isValidIdentifier, type IdentifierValidator } from '../identifier/validator.js';
import { logDebug, logInfo } from '../logger.js';
import type { Batch, EnqueueResult, FlushTrigger, NotificationItem } from '../types.js';
import { encodedListBytes, nowMs, utf8Length } from '../utils.js';

export interface BatchingQueueOptions {
  maxBatchItems: number;
  maxWaitMs: number;
  maxBatchBytes: number;
  capacity: number;
  onFlush: (batch: Batch) => void;
  validate?: IdentifierValidator;
  clock?: () => number;
}

/**
 * In-memory buffer of pending unique identifiers. Flushes into a Batch when
 * the size threshold, the byte threshold or the oldest item's wait interval
 * is reached, whichever comes first.
 *
 * Identifiers stay claimed after a flush until `release` is called for their
 * batch, so a re-submission while the batch is in flight collapses onto it.
 */
export class BatchingQueue {
  private readonly opts: BatchingQueueOptions;
  private readonly validate: IdentifierValidator;
  private readonly clock: () => number;
  private pending = new Map<string, NotificationItem>();
  private pendingBytes = 0;
  private readonly inFlight = new Map<string, number>();
  private nextSequence = 1;
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(opts: BatchingQueueOptions) {
    if (opts.maxBatchItems < 1) {
      throw new Error('maxBatchItems must be at least 1');
    }
    this.opts = opts;
    this.validate = opts.validate ?? isValidIdentifier;
    this.clock = opts.clock ?? nowMs;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  enqueue(identifier: string): EnqueueResult {
    if (this.closed) {
      return { status: 'rejected', reason: 'queue_full', message: 'queue is closed' };
    }

    if (!this.validate(identifier)) {
      return { status: 'rejected', reason: 'invalid', message: describeInvalidIdentifier(identifier) };
    }

    if (this.pending.has(identifier)) {
      return { status: 'duplicate', identifier, sequence: null };
    }
    const inFlightSequence = this.inFlight.get(identifier);
    if (inFlightSequence !== undefined) {
      return { status: 'duplicate', identifier, sequence: inFlightSequence };
    }

    const itemBytes = utf8Length(identifier);
    if (encodedListBytes(1, itemBytes) > this.opts.maxBatchBytes) {
      return {
        status: 'rejected',
        reason: 'invalid',
        message: `identifier does not fit in a batch of ${this.opts.maxBatchBytes} bytes`,
      };
    }

    if (this.pending.size + this.inFlight.size >= this.opts.capacity) {
      return { status: 'rejected', reason: 'queue_full', message: `queue is at capacity (${this.opts.capacity} items)` };
    }

    if (
      this.pending.size > 0 &&
      encodedListBytes(this.pending.size + 1, this.pendingBytes + itemBytes) > this.opts.maxBatchBytes
    ) {
      this.flush('bytes');
    }

    const item: NotificationItem = Object.freeze({ identifier, enqueuedAtMs: this.clock() });
    this.pending.set(identifier, item);
    this.pendingBytes += itemBytes;
    logDebug(`Queued ${identifier} (${this.pending.size} pending)`);

    if (this.pending.size === 1) {
      this.armTimer();
    }

    let sequence: number | null = null;
    if (this.pending.size >= this.opts.maxBatchItems) {
      sequence = this.flush('size')?.sequence ?? null;
    } else if (encodedListBytes(this.pending.size, this.pendingBytes) >= this.opts.maxBatchBytes) {
      sequence = this.flush('bytes')?.sequence ?? null;
    }

    return { status: 'accepted', item, sequence };
  }

  /**
   * Snapshots every pending identifier into one Batch and hands it to
   * `onFlush`. Returns null when nothing is pending.
   */
  flush(trigger: FlushTrigger = 'drain'): Batch | null {
    this.clearTimer();
    if (this.pending.size === 0) {
      return null;
    }

    const items = Object.freeze([...this.pending.values()]);
    const batch: Batch = Object.freeze({
      sequence: this.nextSequence++,
      items,
      identifiers: Object.freeze(items.map((item) => item.identifier)),
      createdAtMs: this.clock(),
      trigger,
    });

    this.pending = new Map();
    this.pendingBytes = 0;
    for (const identifier of batch.identifiers) {
      this.inFlight.set(identifier, batch.sequence);
    }

    logInfo(`Flushed batch #${batch.sequence} with ${batch.identifiers.length} identifiers (${trigger})`);
    this.opts.onFlush(batch);
    return batch;
  }

  /** Frees the capacity held by a batch once it reached a terminal outcome. */
  release(batch: Batch): void {
    for (const identifier of batch.identifiers) {
      if (this.inFlight.get(identifier) === batch.sequence) {
        this.inFlight.delete(identifier);
      }
    }
  }

  /** Stops accepting identifiers and flushes what is pending. */
  close(): Batch | null {
    this.closed = true;
    return this.flush('drain');
  }

  private armTimer(): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush('interval');
    }, this.opts.maxWaitMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (!this.timer) {
      return;
    }
    clearTimeout(this.timer);
    this.timer = null;
  }
}
