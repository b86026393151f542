import { AwaitTimeoutError } from '../errors.js';
import type { Batch, BatchOutcome, SequenceStatus } from '../types.js';

interface Waiter {
  resolve: (outcome: BatchOutcome) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

export interface OutcomeRegistryOptions {
  /** Terminal outcomes kept for status queries. */
  maxRetainedOutcomes: number;
}

/**
 * Await-mode callers waiting for a batch outcome. A caller is keyed by
 * identifier while its item is still unflushed and by batch sequence after
 * the flush; both keys resolve to the same outcome.
 */
export class OutcomeRegistry {
  private readonly byIdentifier = new Map<string, Set<Waiter>>();
  private readonly bySequence = new Map<number, Set<Waiter>>();
  private readonly unresolved = new Set<number>();
  private readonly outcomes = new Map<number, BatchOutcome>();
  private readonly maxRetainedOutcomes: number;

  constructor(opts: OutcomeRegistryOptions) {
    this.maxRetainedOutcomes = Math.max(1, Math.floor(opts.maxRetainedOutcomes));
  }

  waitForIdentifier(identifier: string, timeoutMs: number): Promise<BatchOutcome> {
    return this.register(this.byIdentifier, identifier, timeoutMs);
  }

  waitForSequence(sequence: number, timeoutMs: number): Promise<BatchOutcome> {
    const known = this.outcomes.get(sequence);
    if (known) {
      return Promise.resolve(known);
    }
    return this.register(this.bySequence, sequence, timeoutMs);
  }

  /** Moves waiters registered by identifier onto the batch's sequence. */
  bindBatch(batch: Batch): void {
    this.unresolved.add(batch.sequence);
    let target = this.bySequence.get(batch.sequence);
    for (const identifier of batch.identifiers) {
      const waiters = this.byIdentifier.get(identifier);
      if (!waiters) {
        continue;
      }
      this.byIdentifier.delete(identifier);
      if (!target) {
        target = new Set();
        this.bySequence.set(batch.sequence, target);
      }
      for (const waiter of waiters) {
        target.add(waiter);
      }
    }
  }

  deliver(outcome: BatchOutcome): number {
    this.unresolved.delete(outcome.sequence);
    this.retain(outcome);

    const waiters = this.bySequence.get(outcome.sequence);
    this.bySequence.delete(outcome.sequence);
    if (!waiters) {
      return 0;
    }
    for (const waiter of waiters) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(outcome);
    }
    return waiters.size;
  }

  status(sequence: number): SequenceStatus {
    const outcome = this.outcomes.get(sequence);
    if (outcome) {
      return outcome;
    }
    if (this.unresolved.has(sequence)) {
      return { status: 'pending', sequence };
    }
    return { status: 'unknown', sequence };
  }

  get waiterCount(): number {
    let count = 0;
    for (const waiters of this.byIdentifier.values()) {
      count += waiters.size;
    }
    for (const waiters of this.bySequence.values()) {
      count += waiters.size;
    }
    return count;
  }

  private register<K>(index: Map<K, Set<Waiter>>, key: K, timeoutMs: number): Promise<BatchOutcome> {
    return new Promise<BatchOutcome>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, timer: null };
      let waiters = index.get(key);
      if (!waiters) {
        waiters = new Set();
        index.set(key, waiters);
      }
      waiters.add(waiter);

      if (timeoutMs > 0 && Number.isFinite(timeoutMs)) {
        waiter.timer = setTimeout(() => {
          // The waiter may have moved from the identifier index to a sequence.
          const sequence = this.unregister(waiter);
          waiter.reject(new AwaitTimeoutError(timeoutMs, sequence));
        }, timeoutMs);
      }
    });
  }

  private unregister(waiter: Waiter): number | null {
    for (const [sequence, waiters] of this.bySequence) {
      if (waiters.delete(waiter)) {
        if (waiters.size === 0) {
          this.bySequence.delete(sequence);
        }
        return sequence;
      }
    }
    for (const [identifier, waiters] of this.byIdentifier) {
      if (waiters.delete(waiter)) {
        if (waiters.size === 0) {
          this.byIdentifier.delete(identifier);
        }
        return null;
      }
    }
    return null;
  }

  private retain(outcome: BatchOutcome): void {
    this.outcomes.set(outcome.sequence, outcome);
    while (this.outcomes.size > this.maxRetainedOutcomes) {
      const oldest = this.outcomes.keys().next();
      if (oldest.done) {
        break;
      }
      this.outcomes.delete(oldest.value);
    }
  }
}
