import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DispatchBroadcaster, type DispatchBroadcasterOptions } from '../src/dispatch/broadcaster.js';
import { EndpointPool } from '../src/endpoints/endpointPool.js';
import { RetryableDispatchFailure } from '../src/errors.js';
import type { LedgerOperation } from '../src/ledger/operation.js';
import type { Batch, HealthTransition, LedgerSubmitResult } from '../src/types.js';

type SubmitFn = (operation: LedgerOperation, endpoint: string) => Promise<LedgerSubmitResult>;

const N1 = 'https://n1.example';
const N2 = 'https://n2.example';

function batchOf(sequence: number, identifiers: string[] = ['https://a.example/feed.xml']): Batch {
  return {
    sequence,
    items: identifiers.map((identifier) => ({ identifier, enqueuedAtMs: 0 })),
    identifiers,
    createdAtMs: 0,
    trigger: 'size',
  };
}

function createBroadcaster(
  submit: SubmitFn,
  overrides: Partial<DispatchBroadcasterOptions> = {},
): { broadcaster: DispatchBroadcaster; pool: EndpointPool; delays: number[] } {
  const delays: number[] = [];
  const pool =
    overrides.pool ??
    new EndpointPool({
      addresses: [N1, N2],
      quarantineThreshold: 3,
      quarantineCooldownMs: 60_000,
      clock: () => 0,
    });
  const broadcaster = new DispatchBroadcaster({
    pool,
    ledger: { submit },
    operation: {
      account: 'feed-writer',
      operationIdPrefix: 'pp',
      medium: 'podcast',
      reason: 'update',
    },
    concurrency: 2,
    maxRetries: 3,
    initialBackoffMs: 0,
    maxBackoffMs: 0,
    maxTotalBackoffMs: 0,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides,
  });
  return { broadcaster, pool, delays };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((innerResolve) => {
    resolve = innerResolve;
  });
  return { promise, resolve };
}

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const retryableFailure: LedgerSubmitResult = { ok: false, failure: { kind: 'retryable', reason: 'rate limited' } };

describe('DispatchBroadcaster', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('commits after transient failures and fails over between endpoints', async () => {
    const submit = vi
      .fn<SubmitFn>()
      .mockResolvedValueOnce(retryableFailure)
      .mockResolvedValueOnce(retryableFailure)
      .mockResolvedValueOnce({ ok: true, transactionId: 'tx123' });
    const { broadcaster, pool } = createBroadcaster(submit);
    const transitions: string[] = [];
    pool.on('transition', (event: HealthTransition) => {
      transitions.push(`${event.address} ${event.from}->${event.to}`);
    });

    const outcome = await broadcaster.dispatch(batchOf(1));

    expect(outcome).toEqual({ status: 'committed', sequence: 1, transactionId: 'tx123', endpoint: N1, attempts: 3 });
    expect(submit.mock.calls.map((call) => call[1])).toEqual([N1, N2, N1]);
    expect(transitions).toEqual([`${N1} healthy->degraded`, `${N2} healthy->degraded`, `${N1} degraded->healthy`]);
  });

  it('exhausts after exactly the configured number of retries', async () => {
    const submit = vi.fn<SubmitFn>().mockResolvedValue(retryableFailure);
    const { broadcaster } = createBroadcaster(submit, { maxRetries: 3 });

    const outcome = await broadcaster.dispatch(batchOf(4));

    expect(submit).toHaveBeenCalledTimes(4);
    expect(outcome).toEqual({
      status: 'exhausted',
      sequence: 4,
      reason: 'retries exhausted after 4 attempts: rate limited',
      attempts: 4,
    });
  });

  it('makes a single attempt when retries are disabled', async () => {
    const submit = vi.fn<SubmitFn>().mockResolvedValue(retryableFailure);
    const { broadcaster } = createBroadcaster(submit, { maxRetries: 0 });

    const outcome = await broadcaster.dispatch(batchOf(1));

    expect(submit).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({ status: 'exhausted', attempts: 1 });
  });

  it('exhausts without an attempt when every endpoint is quarantined', async () => {
    const submit = vi.fn<SubmitFn>();
    const pool = new EndpointPool({ addresses: [N1], quarantineThreshold: 1, quarantineCooldownMs: 60_000, clock: () => 0 });
    pool.report(N1, 'failure');
    const { broadcaster } = createBroadcaster(submit, { pool });

    const outcome = await broadcaster.dispatch(batchOf(2));

    expect(submit).not.toHaveBeenCalled();
    expect(outcome).toEqual({
      status: 'exhausted',
      sequence: 2,
      reason: 'no endpoints available: every endpoint is quarantined',
      attempts: 0,
    });
  });

  it('stops on a fatal failure without touching endpoint health', async () => {
    const submit = vi.fn<SubmitFn>().mockResolvedValue({ ok: false, failure: { kind: 'fatal', reason: 'malformed operation' } });
    const { broadcaster, pool } = createBroadcaster(submit);

    const outcome = await broadcaster.dispatch(batchOf(3));

    expect(submit).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({ status: 'exhausted', sequence: 3, reason: 'malformed operation', attempts: 1 });
    expect(pool.get(N1)?.health).toBe('healthy');
  });

  it('treats unexpected thrown errors as retryable', async () => {
    const submit = vi
      .fn<SubmitFn>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ ok: true, transactionId: 'tx-after-throw' });
    const { broadcaster } = createBroadcaster(submit);

    const outcome = await broadcaster.dispatch(batchOf(1));

    expect(outcome).toMatchObject({ status: 'committed', transactionId: 'tx-after-throw', attempts: 2 });
  });

  it('backs off exponentially up to the per-attempt cap', async () => {
    const submit = vi.fn<SubmitFn>().mockResolvedValue(retryableFailure);
    const { broadcaster, delays } = createBroadcaster(submit, {
      maxRetries: 4,
      initialBackoffMs: 100,
      maxBackoffMs: 500,
      maxTotalBackoffMs: 10_000,
    });

    await broadcaster.dispatch(batchOf(1));

    expect(delays).toEqual([100, 200, 400, 500]);
  });

  it('honors a retry-after hint from the ledger client', async () => {
    const submit = vi
      .fn<SubmitFn>()
      .mockRejectedValueOnce(new RetryableDispatchFailure('too many operations per block', 3000))
      .mockResolvedValueOnce({ ok: true, transactionId: 'tx1' });
    const { broadcaster, delays } = createBroadcaster(submit, {
      initialBackoffMs: 100,
      maxBackoffMs: 5000,
      maxTotalBackoffMs: 10_000,
    });

    await broadcaster.dispatch(batchOf(1));

    expect(delays).toEqual([3000]);
  });

  it('waits the full retry-after hint even beyond the per-attempt cap', async () => {
    const submit = vi
      .fn<SubmitFn>()
      .mockResolvedValueOnce({ ok: false, failure: { kind: 'retryable', reason: 'rate limited', retryAfterMs: 8000 } })
      .mockResolvedValueOnce({ ok: true, transactionId: 'tx1' });
    const { broadcaster, delays } = createBroadcaster(submit, {
      initialBackoffMs: 100,
      maxBackoffMs: 500,
      maxTotalBackoffMs: 10_000,
    });

    const outcome = await broadcaster.dispatch(batchOf(1));

    expect(delays).toEqual([8000]);
    expect(outcome).toMatchObject({ status: 'committed', transactionId: 'tx1', attempts: 2 });
  });

  it('counts a retry-after hint against the total backoff ceiling', async () => {
    const submit = vi
      .fn<SubmitFn>()
      .mockResolvedValue({ ok: false, failure: { kind: 'retryable', reason: 'rate limited', retryAfterMs: 8000 } });
    const { broadcaster, delays } = createBroadcaster(submit, {
      initialBackoffMs: 100,
      maxBackoffMs: 500,
      maxTotalBackoffMs: 5000,
    });

    const outcome = await broadcaster.dispatch(batchOf(1));

    expect(delays).toEqual([]);
    expect(outcome).toEqual({
      status: 'exhausted',
      sequence: 1,
      reason: 'backoff ceiling reached after 1 attempts: rate limited',
      attempts: 1,
    });
  });

  it('exhausts when the total backoff ceiling would be exceeded', async () => {
    const submit = vi.fn<SubmitFn>().mockResolvedValue(retryableFailure);
    const { broadcaster, delays } = createBroadcaster(submit, {
      maxRetries: 10,
      initialBackoffMs: 100,
      maxBackoffMs: 1000,
      maxTotalBackoffMs: 250,
    });

    const outcome = await broadcaster.dispatch(batchOf(1));

    expect(delays).toEqual([100]);
    expect(outcome).toEqual({
      status: 'exhausted',
      sequence: 1,
      reason: 'backoff ceiling reached after 2 attempts: rate limited',
      attempts: 2,
    });
  });

  it('exhausts a batch whose payload exceeds the operation limit', async () => {
    const submit = vi.fn<SubmitFn>();
    const { broadcaster } = createBroadcaster(submit, {
      operation: {
        account: 'feed-writer',
        operationIdPrefix: 'pp',
        medium: 'podcast',
        reason: 'update',
        maxPayloadBytes: 64,
      },
    });

    const outcome = await broadcaster.dispatch(batchOf(1, ['https://a.example/feed.xml', 'https://b.example/feed.xml']));

    expect(submit).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ status: 'exhausted', attempts: 0 });
  });

  it('never runs two attempts for the same batch at once', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    let calls = 0;
    const submit = vi.fn<SubmitFn>(async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await tick();
      inFlight -= 1;
      calls += 1;
      return calls < 3 ? retryableFailure : { ok: true, transactionId: 'tx-seq' };
    });
    const { broadcaster } = createBroadcaster(submit);

    await broadcaster.dispatch(batchOf(1));

    expect(maxInFlight).toBe(1);
    expect(submit).toHaveBeenCalledTimes(3);
  });

  it('limits how many batches are attempting at once', async () => {
    const first = deferred<LedgerSubmitResult>();
    const second = deferred<LedgerSubmitResult>();
    const submit = vi.fn<SubmitFn>().mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const { broadcaster } = createBroadcaster(submit, { concurrency: 1 });

    const one = broadcaster.dispatch(batchOf(1));
    const two = broadcaster.dispatch(batchOf(2));
    await tick();

    expect(submit).toHaveBeenCalledTimes(1);
    expect(broadcaster.inspect(1)).toMatchObject({ phase: 'attempting', attempts: 1, lastEndpoint: N1 });
    expect(broadcaster.inspect(2)).toMatchObject({ phase: 'pending', attempts: 0 });
    expect(broadcaster.queuedCount).toBe(1);

    first.resolve({ ok: true, transactionId: 'tx-1' });
    await tick();
    expect(submit).toHaveBeenCalledTimes(2);

    second.resolve({ ok: true, transactionId: 'tx-2' });
    await expect(one).resolves.toMatchObject({ transactionId: 'tx-1' });
    await expect(two).resolves.toMatchObject({ transactionId: 'tx-2' });
    await broadcaster.idle();
    expect(broadcaster.activeCount).toBe(0);
    expect(broadcaster.inspect(1)).toBeNull();
  });

  it('lets batches complete out of sequence order', async () => {
    const slow = deferred<LedgerSubmitResult>();
    const submit = vi
      .fn<SubmitFn>()
      .mockReturnValueOnce(slow.promise)
      .mockResolvedValueOnce({ ok: true, transactionId: 'tx-fast' });
    const { broadcaster } = createBroadcaster(submit);
    const finished: number[] = [];

    const one = broadcaster.dispatch(batchOf(1)).then((outcome) => finished.push(outcome.sequence));
    const two = broadcaster.dispatch(batchOf(2)).then((outcome) => finished.push(outcome.sequence));
    await two;
    slow.resolve({ ok: true, transactionId: 'tx-slow' });
    await one;

    expect(finished).toEqual([2, 1]);
  });
});
