import { z } from 'zod';
import type { BatchOutcome, DispatchStats, SequenceStatus } from '../types.js';

export const LEGACY_OK = 'OK';
export const LEGACY_INVALID = 'Invalid IRI';
export const AWAIT_TIMEOUT_REASON = 'timed out, outcome still pending';

const requestIdSchema = z.union([z.string().min(1).max(128), z.number().int()]);

export const ipcRequestSchema = z.discriminatedUnion('kind', [
  z.object({
    id: requestIdSchema.optional(),
    kind: z.literal('submit'),
    identifier: z.string(),
    mode: z.enum(['fire_and_forget', 'await']).default('fire_and_forget'),
    timeoutMs: z.number().int().min(1).max(24 * 60 * 60 * 1000).optional(),
  }),
  z.object({
    id: requestIdSchema.optional(),
    kind: z.literal('status'),
    sequence: z.number().int().min(1),
  }),
  z.object({
    id: requestIdSchema.optional(),
    kind: z.literal('stats'),
  }),
]);

export type IpcRequest = z.infer<typeof ipcRequestSchema>;
export type IpcRequestInput = z.input<typeof ipcRequestSchema>;
export type IpcRequestId = z.infer<typeof requestIdSchema>;

export type IpcResponseBody =
  | { status: 'accepted'; duplicate: boolean }
  | { status: 'committed'; sequence: number; transaction_id: string }
  | { status: 'exhausted'; sequence: number; reason: string }
  | { status: 'pending'; sequence?: number; reason?: string }
  | { status: 'unknown'; sequence: number }
  | { status: 'rejected'; code: string; reason: string }
  | { status: 'error'; reason: string }
  | ({ status: 'stats' } & DispatchStats);

export type IpcResponse = IpcResponseBody & { id?: IpcRequestId };

const endpointSnapshotSchema = z.object({
  address: z.string(),
  health: z.enum(['healthy', 'degraded', 'quarantined']),
  consecutiveFailures: z.number(),
  lastFailureAtMs: z.number().nullable(),
  quarantinedUntilMs: z.number().nullable(),
});

const responseId = { id: requestIdSchema.optional() };

const ipcResponseSchema = z.discriminatedUnion('status', [
  z.object({ ...responseId, status: z.literal('accepted'), duplicate: z.boolean() }),
  z.object({ ...responseId, status: z.literal('committed'), sequence: z.number(), transaction_id: z.string() }),
  z.object({ ...responseId, status: z.literal('exhausted'), sequence: z.number(), reason: z.string() }),
  z.object({
    ...responseId,
    status: z.literal('pending'),
    sequence: z.number().optional(),
    reason: z.string().optional(),
  }),
  z.object({ ...responseId, status: z.literal('unknown'), sequence: z.number() }),
  z.object({ ...responseId, status: z.literal('rejected'), code: z.string(), reason: z.string() }),
  z.object({ ...responseId, status: z.literal('error'), reason: z.string() }),
  z.object({
    ...responseId,
    status: z.literal('stats'),
    uptimeMs: z.number(),
    received: z.number(),
    deduplicated: z.number(),
    duplicates: z.number(),
    sent: z.number(),
    failed: z.number(),
    inFlight: z.number(),
    batchesCommitted: z.number(),
    batchesExhausted: z.number(),
    endpoints: z.array(endpointSnapshotSchema),
  }),
]);

const requestEnvelopeSchema = z.object({ id: requestIdSchema.optional() });

/** Reads the id of a request that may otherwise be malformed. */
export function requestIdOf(raw: unknown): IpcRequestId | undefined {
  const envelope = requestEnvelopeSchema.safeParse(raw);
  return envelope.success ? envelope.data.id : undefined;
}

export function outcomeToResponse(outcome: BatchOutcome | SequenceStatus): IpcResponseBody {
  switch (outcome.status) {
    case 'committed':
      return { status: 'committed', sequence: outcome.sequence, transaction_id: outcome.transactionId };
    case 'exhausted':
      return { status: 'exhausted', sequence: outcome.sequence, reason: outcome.reason };
    case 'pending':
      return { status: 'pending', sequence: outcome.sequence };
    case 'unknown':
      return { status: 'unknown', sequence: outcome.sequence };
  }
}

export function encodeMessage(message: IpcResponse | IpcRequestInput): string {
  return `${JSON.stringify(message)}\n`;
}

/** Parses one response line; returns null for anything that is not a response object. */
export function parseResponseLine(line: string): IpcResponse | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = ipcResponseSchema.safeParse(raw);
  if (!result.success) {
    return null;
  }
  return result.data;
}

/**
 * Splits a growing buffer into complete lines. Returns the lines and the
 * unterminated remainder.
 */
export function splitLines(buffer: string): { lines: string[]; rest: string } {
  const lines: string[] = [];
  let rest = buffer;
  while (true) {
    const newlineIndex = rest.indexOf('\n');
    if (newlineIndex === -1) {
      break;
    }
    const line = rest.slice(0, newlineIndex).trim();
    rest = rest.slice(newlineIndex + 1);
    if (line.length > 0) {
      lines.push(line);
    }
  }
  return { lines, rest };
}
