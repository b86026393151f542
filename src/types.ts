export const MEDIA = ['podcast', 'music', 'video', 'film', 'audiobook', 'newsletter', 'blog'] as const;
export const REASONS = ['update', 'live', 'liveEnd'] as const;

export type Medium = (typeof MEDIA)[number];
export type Reason = (typeof REASONS)[number];

export interface NotificationItem {
  readonly identifier: string;
  readonly enqueuedAtMs: number;
}

export type FlushTrigger = 'size' | 'bytes' | 'interval' | 'drain';

export interface Batch {
  readonly sequence: number;
  readonly items: readonly NotificationItem[];
  readonly identifiers: readonly string[];
  readonly createdAtMs: number;
  readonly trigger: FlushTrigger;
}

export type EnqueueResult =
  | { status: 'accepted'; item: NotificationItem; sequence: number | null }
  | { status: 'duplicate'; identifier: string; sequence: number | null }
  | { status: 'rejected'; reason: 'invalid' | 'queue_full'; message: string };

export type EndpointHealth = 'healthy' | 'degraded' | 'quarantined';

export interface EndpointSnapshot {
  readonly address: string;
  readonly health: EndpointHealth;
  readonly consecutiveFailures: number;
  readonly lastFailureAtMs: number | null;
  readonly quarantinedUntilMs: number | null;
}

export interface HealthTransition {
  address: string;
  from: EndpointHealth;
  to: EndpointHealth;
  atMs: number;
}

export type ClassifiedFailure =
  | { kind: 'retryable'; reason: string; retryAfterMs?: number }
  | { kind: 'fatal'; reason: string };

export type LedgerSubmitResult = { ok: true; transactionId: string } | { ok: false; failure: ClassifiedFailure };

/** Result of a single attempt against one endpoint. */
export type DispatchOutcome =
  | { kind: 'committed'; transactionId: string }
  | { kind: 'retryable-failure'; reason: string; retryAfterMs: number | null }
  | { kind: 'fatal-failure'; reason: string };

export type BatchPhase = 'pending' | 'attempting' | 'committed' | 'exhausted';

/** Terminal outcome of a batch, delivered to every waiter. */
export type BatchOutcome =
  | {
      status: 'committed';
      sequence: number;
      transactionId: string;
      endpoint: string;
      attempts: number;
    }
  | {
      status: 'exhausted';
      sequence: number;
      reason: string;
      attempts: number;
    };

export type SequenceStatus = BatchOutcome | { status: 'pending'; sequence: number } | { status: 'unknown'; sequence: number };

export type SubmitMode = 'fire_and_forget' | 'await';

export interface SubmitAck {
  status: 'accepted';
  duplicate: boolean;
  sequence: number | null;
}

export interface DispatchStats {
  uptimeMs: number;
  received: number;
  deduplicated: number;
  duplicates: number;
  sent: number;
  failed: number;
  inFlight: number;
  batchesCommitted: number;
  batchesExhausted: number;
  endpoints: EndpointSnapshot[];
}
