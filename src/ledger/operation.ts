import { PayloadTooLargeError } from '../errors.js';
import type { Batch, Medium, Reason } from '../types.js';
import { utf8Length } from '../utils.js';

export const PAYLOAD_VERSION = '1.0';
export const DEFAULT_OPERATION_MAX_BYTES = 8192;

export interface OperationOptions {
  account: string;
  operationIdPrefix: string;
  medium: Medium;
  reason: Reason;
  maxPayloadBytes?: number;
}

export interface NotificationPayload {
  version: string;
  medium: Medium;
  reason: Reason;
  iris: string[];
}

export interface LedgerOperation {
  type: 'custom_json';
  id: string;
  requiredAuths: string[];
  requiredPostingAuths: string[];
  json: string;
  /** Batch sequence; 0 for the startup operation. */
  sequence: number;
}

export interface StartupPayload {
  version: string;
  server_account: string;
  message: string;
  uuid: string;
  endpoint: string;
}

export const STARTUP_OPERATION_SUFFIX = 'startup';

export function operationId(prefix: string, medium: Medium, reason: Reason): string {
  return `${prefix}_${medium}_${reason}`;
}

export function startupOperationId(prefix: string): string {
  return `${prefix}_${STARTUP_OPERATION_SUFFIX}`;
}

/**
 * Bytes the notification payload adds around its `iris` array. A batch whose
 * encoded identifier list is at most `maxPayloadBytes - envelopeBytes(...)`
 * always fits in one operation.
 */
export function envelopeBytes(medium: Medium, reason: Reason): number {
  const empty: NotificationPayload = { version: PAYLOAD_VERSION, medium, reason, iris: [] };
  return utf8Length(JSON.stringify(empty)) - 2;
}

export function buildOperation(batch: Batch, opts: OperationOptions): LedgerOperation {
  const payload: NotificationPayload = {
    version: PAYLOAD_VERSION,
    medium: opts.medium,
    reason: opts.reason,
    iris: [...batch.identifiers],
  };
  return customJson(operationId(opts.operationIdPrefix, opts.medium, opts.reason), payload, opts, batch.sequence);
}

/** The operation broadcast once before serving, to prove the account can write. */
export function buildStartupOperation(
  opts: OperationOptions,
  details: Omit<StartupPayload, 'version' | 'server_account'>,
): LedgerOperation {
  const payload: StartupPayload = { version: PAYLOAD_VERSION, server_account: opts.account, ...details };
  return customJson(startupOperationId(opts.operationIdPrefix), payload, opts, 0);
}

function customJson(
  id: string,
  payload: NotificationPayload | StartupPayload,
  opts: OperationOptions,
  sequence: number,
): LedgerOperation {
  const json = JSON.stringify(payload);
  const maxBytes = opts.maxPayloadBytes ?? DEFAULT_OPERATION_MAX_BYTES;
  const size = utf8Length(json);
  if (size > maxBytes) {
    throw new PayloadTooLargeError(size, maxBytes);
  }

  return {
    type: 'custom_json',
    id,
    requiredAuths: [],
    requiredPostingAuths: [opts.account],
    json,
    sequence,
  };
}
