import type { EndpointPool } from '../endpoints/endpointPool.js';
import { classifyError } from '../errors.js';
import type { LedgerClient } from '../ledger/client.js';
import { buildOperation, type LedgerOperation, type OperationOptions } from '../ledger/operation.js';
import { logError, logInfo, logWarn } from '../logger.js';
import type { Batch, BatchOutcome, BatchPhase, ClassifiedFailure, DispatchOutcome, EndpointSnapshot } from '../types.js';
import { getErrorMessage, nowMs, sleep } from '../utils.js';

export interface DispatchBroadcasterOptions {
  pool: EndpointPool;
  ledger: LedgerClient;
  operation: OperationOptions;
  concurrency: number;
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  maxTotalBackoffMs: number;
  jitterRatio?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
}

export interface BatchDispatchState {
  sequence: number;
  phase: BatchPhase;
  attempts: number;
  retries: number;
  totalBackoffMs: number;
  backoffUntilMs: number | null;
  lastEndpoint: string | null;
  lastReason: string | null;
  queuedAtMs: number;
}

/**
 * Commits batches to the ledger. Each batch runs through
 * pending -> attempting -> committed | exhausted, one attempt at a time;
 * up to `concurrency` batches are attempting at once.
 */
export class DispatchBroadcaster {
  private readonly opts: DispatchBroadcasterOptions;
  private readonly concurrency: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;
  private readonly states = new Map<number, BatchDispatchState>();
  private readonly tasks = new Set<Promise<BatchOutcome>>();
  private readonly slotWaiters: Array<() => void> = [];
  private activeSlots = 0;

  constructor(opts: DispatchBroadcasterOptions) {
    this.opts = opts;
    this.concurrency = Math.max(1, Math.floor(opts.concurrency));
    this.sleep = opts.sleep ?? sleep;
    this.clock = opts.clock ?? nowMs;
  }

  get activeCount(): number {
    return this.activeSlots;
  }

  get queuedCount(): number {
    return this.slotWaiters.length;
  }

  /** Resolves with the terminal outcome; never rejects. */
  dispatch(batch: Batch): Promise<BatchOutcome> {
    const state: BatchDispatchState = {
      sequence: batch.sequence,
      phase: 'pending',
      attempts: 0,
      retries: 0,
      totalBackoffMs: 0,
      backoffUntilMs: null,
      lastEndpoint: null,
      lastReason: null,
      queuedAtMs: this.clock(),
    };
    this.states.set(batch.sequence, state);

    const task = this.execute(batch, state);
    this.tasks.add(task);
    void task.finally(() => {
      this.tasks.delete(task);
    });
    return task;
  }

  inspect(sequence: number): BatchDispatchState | null {
    const state = this.states.get(sequence);
    return state ? { ...state } : null;
  }

  /** Waits until every dispatched batch reached a terminal outcome. */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  private async execute(batch: Batch, state: BatchDispatchState): Promise<BatchOutcome> {
    await this.acquireSlot();
    const startedAtMs = this.clock();
    try {
      const outcome = await this.run(batch, state);
      this.logTerminal(batch, state, outcome, this.clock() - startedAtMs);
      return outcome;
    } catch (error) {
      const outcome = this.exhaust(state, `dispatch crashed: ${getErrorMessage(error)}`);
      this.logTerminal(batch, state, outcome, this.clock() - startedAtMs);
      return outcome;
    } finally {
      this.states.delete(batch.sequence);
      this.releaseSlot();
    }
  }

  private async run(batch: Batch, state: BatchDispatchState): Promise<BatchOutcome> {
    let operation: LedgerOperation;
    try {
      operation = buildOperation(batch, this.opts.operation);
    } catch (error) {
      return this.exhaust(state, getErrorMessage(error));
    }

    state.phase = 'attempting';
    while (true) {
      let endpoint: EndpointSnapshot;
      try {
        endpoint = this.opts.pool.select({ avoid: state.lastEndpoint });
      } catch (error) {
        return this.exhaust(state, getErrorMessage(error));
      }

      state.attempts += 1;
      state.retries = state.attempts - 1;
      state.lastEndpoint = endpoint.address;
      if (state.retries > 0) {
        logInfo(`Retry ${state.retries} for batch #${batch.sequence} via ${endpoint.address}`);
      }

      const outcome = await this.attempt(operation, endpoint.address);

      if (outcome.kind === 'committed') {
        this.opts.pool.report(endpoint.address, 'success');
        state.phase = 'committed';
        state.lastReason = null;
        return {
          status: 'committed',
          sequence: state.sequence,
          transactionId: outcome.transactionId,
          endpoint: endpoint.address,
          attempts: state.attempts,
        };
      }

      if (outcome.kind === 'fatal-failure') {
        return this.exhaust(state, outcome.reason);
      }

      this.opts.pool.report(endpoint.address, 'failure');
      state.lastReason = outcome.reason;
      logWarn(`Batch #${batch.sequence} attempt ${state.attempts} via ${endpoint.address} failed: ${outcome.reason}`);

      if (state.retries >= this.opts.maxRetries) {
        return this.exhaust(state, `retries exhausted after ${state.attempts} attempts: ${outcome.reason}`);
      }

      const delayMs = this.nextBackoffMs(state, outcome.retryAfterMs);
      if (state.totalBackoffMs + delayMs > this.opts.maxTotalBackoffMs) {
        return this.exhaust(state, `backoff ceiling reached after ${state.attempts} attempts: ${outcome.reason}`);
      }

      state.totalBackoffMs += delayMs;
      if (delayMs > 0) {
        state.backoffUntilMs = this.clock() + delayMs;
        logWarn(`Waiting ${delayMs}ms before retrying batch #${batch.sequence}`);
        await this.sleep(delayMs);
        state.backoffUntilMs = null;
      }
    }
  }

  private async attempt(operation: LedgerOperation, endpoint: string): Promise<DispatchOutcome> {
    let failure: ClassifiedFailure;
    try {
      const result = await this.opts.ledger.submit(operation, endpoint);
      if (result.ok) {
        return { kind: 'committed', transactionId: result.transactionId };
      }
      failure = result.failure;
    } catch (error) {
      failure = classifyError(error);
    }

    if (failure.kind === 'fatal') {
      return { kind: 'fatal-failure', reason: failure.reason };
    }
    return { kind: 'retryable-failure', reason: failure.reason, retryAfterMs: failure.retryAfterMs ?? null };
  }

  private nextBackoffMs(state: BatchDispatchState, retryAfterMs: number | null): number {
    const { initialBackoffMs, maxBackoffMs } = this.opts;
    const exponentialMs = initialBackoffMs * 2 ** Math.max(0, state.attempts - 1);
    const cappedMs = Math.min(maxBackoffMs, exponentialMs);
    const jitterRatio = this.opts.jitterRatio ?? 0;
    const jitterMs = jitterRatio > 0 ? Math.floor(Math.random() * cappedMs * jitterRatio) : 0;
    const backoffMs = Math.min(maxBackoffMs, cappedMs + jitterMs);
    // A server-requested wait is not capped here; it still counts against maxTotalBackoffMs.
    return Math.max(backoffMs, retryAfterMs ?? 0);
  }

  private exhaust(state: BatchDispatchState, reason: string): BatchOutcome {
    state.phase = 'exhausted';
    state.lastReason = reason;
    return {
      status: 'exhausted',
      sequence: state.sequence,
      reason,
      attempts: state.attempts,
    };
  }

  private logTerminal(batch: Batch, state: BatchDispatchState, outcome: BatchOutcome, durationMs: number): void {
    const summary =
      `batch #${batch.sequence} | identifiers: ${batch.identifiers.length} | attempts: ${state.attempts} | ` +
      `send time: ${(durationMs / 1000).toFixed(2)}s | last endpoint: ${state.lastEndpoint ?? 'none'}`;
    if (outcome.status === 'committed') {
      logInfo(`Committed ${summary} | tx: ${outcome.transactionId}`);
      return;
    }
    logError(`Exhausted ${summary} | reason: ${outcome.reason}`);
  }

  private acquireSlot(): Promise<void> {
    if (this.activeSlots < this.concurrency) {
      this.activeSlots += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.slotWaiters.push(resolve);
    });
  }

  private releaseSlot(): void {
    const next = this.slotWaiters.shift();
    if (next) {
      // The slot passes straight to the next batch.
      next();
      return;
    }
    this.activeSlots -= 1;
  }
}
