import { afterEach, describe, expect, it, vi } from 'vitest';
import { OutcomeRegistry } from '../src/dispatch/outcomeRegistry.js';
import { AwaitTimeoutError } from '../src/errors.js';
import type { Batch } from '../src/types.js';

function batchOf(sequence: number, identifiers: string[]): Batch {
  return {
    sequence,
    items: identifiers.map((identifier) => ({ identifier, enqueuedAtMs: 0 })),
    identifiers,
    createdAtMs: 0,
    trigger: 'size',
  };
}

describe('OutcomeRegistry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves identifier waiters once their batch is bound and delivered', async () => {
    const registry = new OutcomeRegistry({ maxRetainedOutcomes: 10 });
    const first = registry.waitForIdentifier('https://a.example/feed.xml', 1000);
    const second = registry.waitForIdentifier('https://a.example/feed.xml', 1000);

    registry.bindBatch(batchOf(1, ['https://a.example/feed.xml', 'https://b.example/feed.xml']));
    expect(registry.status(1)).toEqual({ status: 'pending', sequence: 1 });

    const delivered = registry.deliver({
      status: 'committed',
      sequence: 1,
      transactionId: 'tx123',
      endpoint: 'https://n1.example',
      attempts: 1,
    });

    expect(delivered).toBe(2);
    await expect(first).resolves.toMatchObject({ transactionId: 'tx123' });
    await expect(second).resolves.toMatchObject({ transactionId: 'tx123' });
    expect(registry.waiterCount).toBe(0);
  });

  it('answers sequence waits from retained outcomes', async () => {
    const registry = new OutcomeRegistry({ maxRetainedOutcomes: 10 });
    registry.bindBatch(batchOf(3, ['https://a.example/feed.xml']));
    registry.deliver({ status: 'exhausted', sequence: 3, reason: 'retries exhausted', attempts: 6 });

    await expect(registry.waitForSequence(3, 1000)).resolves.toEqual({
      status: 'exhausted',
      sequence: 3,
      reason: 'retries exhausted',
      attempts: 6,
    });
  });

  it('reports unknown sequences and evicts the oldest retained outcome', () => {
    const registry = new OutcomeRegistry({ maxRetainedOutcomes: 2 });
    for (const sequence of [1, 2, 3]) {
      registry.bindBatch(batchOf(sequence, [`https://feeds.example/${sequence}`]));
      registry.deliver({ status: 'exhausted', sequence, reason: 'fatal', attempts: 1 });
    }

    expect(registry.status(1)).toEqual({ status: 'unknown', sequence: 1 });
    expect(registry.status(3)).toMatchObject({ status: 'exhausted', sequence: 3 });
    expect(registry.status(99)).toEqual({ status: 'unknown', sequence: 99 });
  });

  it('times out a waiter without affecting other waiters of the same batch', async () => {
    vi.useFakeTimers();
    const registry = new OutcomeRegistry({ maxRetainedOutcomes: 10 });
    const impatient = registry.waitForIdentifier('https://a.example/feed.xml', 100);
    const patient = registry.waitForIdentifier('https://a.example/feed.xml', 10_000);
    registry.bindBatch(batchOf(5, ['https://a.example/feed.xml']));

    const timedOut = expect(impatient).rejects.toMatchObject({ name: 'AwaitTimeoutError', sequence: 5 });
    vi.advanceTimersByTime(100);
    await timedOut;
    expect(registry.waiterCount).toBe(1);

    registry.deliver({ status: 'committed', sequence: 5, transactionId: 'tx5', endpoint: 'https://n1.example', attempts: 1 });
    await expect(patient).resolves.toMatchObject({ transactionId: 'tx5' });
  });

  it('reports a null sequence when the waiter timed out before its flush', async () => {
    vi.useFakeTimers();
    const registry = new OutcomeRegistry({ maxRetainedOutcomes: 10 });
    const waiting = registry.waitForIdentifier('https://a.example/feed.xml', 50);

    const timedOut = expect(waiting).rejects.toBeInstanceOf(AwaitTimeoutError);
    vi.advanceTimersByTime(50);
    await timedOut;
    await waiting.catch((error: unknown) => {
      expect(error).toMatchObject({ sequence: null, message: 'timed out after 50ms, outcome still pending' });
    });
    expect(registry.waiterCount).toBe(0);
  });
});
