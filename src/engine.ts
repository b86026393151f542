import type { DispatchBroadcaster } from './dispatch/broadcaster.js';
import { OutcomeRegistry } from './dispatch/outcomeRegistry.js';
import type { EndpointPool } from './endpoints/endpointPool.js';
import { QueueFullError, ValidationError } from './errors.js';
import { logError, logInfo } from './logger.js';
import { BatchingQueue } from './queue/batchingQueue.js';
import type { IdentifierValidator } from './identifier/validator.js';
import type { Batch, BatchOutcome, DispatchStats, EnqueueResult, SequenceStatus, SubmitAck } from './types.js';
import { formatDuration, nowMs } from './utils.js';

export interface DispatchEngineOptions {
  pool: EndpointPool;
  broadcaster: DispatchBroadcaster;
  batch: {
    maxItems: number;
    maxWaitMs: number;
    maxBytes: number;
  };
  queueCapacity: number;
  awaitTimeoutMs: number;
  maxRetainedOutcomes: number;
  statusReportIntervalMs: number;
  validate?: IdentifierValidator;
  clock?: () => number;
}

interface Counters {
  received: number;
  deduplicated: number;
  duplicates: number;
  sent: number;
  failed: number;
  batchesCommitted: number;
  batchesExhausted: number;
}

/**
 * Front door of the dispatcher: admits identifiers into the batching queue,
 * hands flushed batches to the broadcaster and routes terminal outcomes back
 * to await-mode callers.
 */
export class DispatchEngine {
  private readonly opts: DispatchEngineOptions;
  private readonly queue: BatchingQueue;
  private readonly registry: OutcomeRegistry;
  private readonly clock: () => number;
  private readonly startedAtMs: number;
  private readonly counters: Counters = {
    received: 0,
    deduplicated: 0,
    duplicates: 0,
    sent: 0,
    failed: 0,
    batchesCommitted: 0,
    batchesExhausted: 0,
  };
  private statusTimer: NodeJS.Timeout | null = null;

  constructor(opts: DispatchEngineOptions) {
    this.opts = opts;
    this.clock = opts.clock ?? nowMs;
    this.startedAtMs = this.clock();
    this.registry = new OutcomeRegistry({ maxRetainedOutcomes: opts.maxRetainedOutcomes });
    this.queue = new BatchingQueue({
      maxBatchItems: opts.batch.maxItems,
      maxWaitMs: opts.batch.maxWaitMs,
      maxBatchBytes: opts.batch.maxBytes,
      capacity: opts.queueCapacity,
      validate: opts.validate,
      clock: this.clock,
      onFlush: (batch) => {
        this.onFlush(batch);
      },
    });
  }

  start(): void {
    if (this.statusTimer || this.opts.statusReportIntervalMs <= 0) {
      return;
    }
    this.statusTimer = setInterval(() => {
      this.reportStatus();
    }, this.opts.statusReportIntervalMs);
    this.statusTimer.unref();
  }

  /** Stops admitting identifiers, flushes the queue and waits for in-flight batches. */
  async stop(): Promise<void> {
    if (this.statusTimer) {
      clearInterval(this.statusTimer);
      this.statusTimer = null;
    }
    this.queue.close();
    await this.opts.broadcaster.idle();
    this.reportStatus();
  }

  /**
   * Fire-and-forget submission. Throws `ValidationError` or `QueueFullError`
   * when the identifier is not admitted.
   */
  submit(identifier: string): SubmitAck {
    const result = this.admit(identifier);
    return { status: 'accepted', duplicate: result.status === 'duplicate', sequence: result.sequence };
  }

  /**
   * Submits and waits for the outcome of the batch the identifier ends up in.
   * Rejects with `AwaitTimeoutError` after `timeoutMs`; the dispatch itself
   * carries on.
   */
  submitAndWait(identifier: string, timeoutMs: number = this.opts.awaitTimeoutMs): Promise<BatchOutcome> {
    let result: Exclude<EnqueueResult, { status: 'rejected' }>;
    try {
      result = this.admit(identifier);
    } catch (error) {
      return Promise.reject(error);
    }

    if (result.sequence !== null) {
      return this.registry.waitForSequence(result.sequence, timeoutMs);
    }
    const key = result.status === 'accepted' ? result.item.identifier : result.identifier;
    return this.registry.waitForIdentifier(key, timeoutMs);
  }

  status(sequence: number): SequenceStatus {
    return this.registry.status(sequence);
  }

  /** Flushes whatever is pending without waiting for a threshold. */
  flush(): Batch | null {
    return this.queue.flush('drain');
  }

  stats(): DispatchStats {
    return {
      uptimeMs: this.clock() - this.startedAtMs,
      ...this.counters,
      inFlight: this.queue.pendingCount + this.queue.inFlightCount,
      endpoints: this.opts.pool.snapshot(),
    };
  }

  private admit(identifier: string): Exclude<EnqueueResult, { status: 'rejected' }> {
    const result = this.queue.enqueue(identifier);
    if (result.status === 'rejected') {
      if (result.reason === 'invalid') {
        throw new ValidationError(result.message);
      }
      throw new QueueFullError(this.opts.queueCapacity);
    }

    this.counters.received += 1;
    if (result.status === 'duplicate') {
      this.counters.duplicates += 1;
    } else {
      this.counters.deduplicated += 1;
    }
    return result;
  }

  private onFlush(batch: Batch): void {
    this.registry.bindBatch(batch);
    void this.opts.broadcaster.dispatch(batch).then(
      (outcome) => {
        this.settle(batch, outcome);
      },
      (error: unknown) => {
        logError(`Dispatch of batch #${batch.sequence} failed unexpectedly`, error);
        this.settle(batch, { status: 'exhausted', sequence: batch.sequence, reason: 'dispatch failed', attempts: 0 });
      },
    );
  }

  private settle(batch: Batch, outcome: BatchOutcome): void {
    if (outcome.status === 'committed') {
      this.counters.sent += batch.identifiers.length;
      this.counters.batchesCommitted += 1;
    } else {
      this.counters.failed += batch.identifiers.length;
      this.counters.batchesExhausted += 1;
    }
    this.registry.deliver(outcome);
    this.queue.release(batch);
  }

  private reportStatus(): void {
    const stats = this.stats();
    const endpoints = stats.endpoints.map((endpoint) => `${endpoint.address}=${endpoint.health}`).join(', ');
    logInfo(
      `Status - Uptime: ${formatDuration(stats.uptimeMs)} | Received: ${stats.received} | ` +
        `Deduped: ${stats.deduplicated} | Sent: ${stats.sent} | Failed: ${stats.failed} | ` +
        `In flight: ${stats.inFlight} | Endpoints: ${endpoints}`,
    );
  }
}
