import { z } from 'zod';
import { classifyError } from '../errors.js';
import { logDebug } from '../logger.js';
import type { LedgerSubmitResult } from '../types.js';
import { getErrorMessage } from '../utils.js';
import type { LedgerClient } from './client.js';
import { fetchWithTimeout, parseRetryAfterMs } from './http.js';
import type { LedgerOperation } from './operation.js';
import type { TransactionSigner } from './signer.js';

interface JsonRpcLedgerClientConfig {
  signer: TransactionSigner;
  method?: string;
  requestTimeoutMs?: number;
}

const rpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal('2.0').optional(),
    id: z.union([z.number(), z.string(), z.null()]).optional(),
    result: z
      .object({
        id: z.string().min(1),
      })
      .passthrough(),
  }),
  z.object({
    jsonrpc: z.literal('2.0').optional(),
    id: z.union([z.number(), z.string(), z.null()]).optional(),
    error: z.object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
]);

const FATAL_RPC_CODES = new Set([-32600, -32601, -32602]);
const FATAL_RPC_MESSAGES = /missing (required )?(posting|active|owner) auth|tx_missing_\w+_auth|invalid (signature|account)|payload exceeded/i;

/**
 * Broadcasts a signed operation to a JSON-RPC write endpoint and classifies
 * the answer as committed, retryable or fatal.
 */
export class JsonRpcLedgerClient implements LedgerClient {
  private static readonly DEFAULT_METHOD = 'condenser_api.broadcast_transaction_synchronous';
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
  private static readonly RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

  private readonly signer: TransactionSigner;
  private readonly method: string;
  private readonly requestTimeoutMs: number;
  private nextId = 1;

  constructor(config: JsonRpcLedgerClientConfig) {
    this.signer = config.signer;
    this.method = config.method ?? JsonRpcLedgerClient.DEFAULT_METHOD;
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? JsonRpcLedgerClient.DEFAULT_REQUEST_TIMEOUT_MS);
  }

  async submit(operation: LedgerOperation, endpoint: string): Promise<LedgerSubmitResult> {
    let transaction: Record<string, unknown>;
    try {
      transaction = await this.signer.sign(operation);
    } catch (error) {
      return { ok: false, failure: classifyError(error) };
    }

    const id = this.nextId++;
    let response: Response;
    try {
      response = await fetchWithTimeout(
        endpoint,
        {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify({ jsonrpc: '2.0', id, method: this.method, params: [transaction] }),
        },
        this.requestTimeoutMs,
      );
    } catch (error) {
      return retryable(`${endpoint} unreachable: ${getErrorMessage(error)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      const reason = `${endpoint} responded ${response.status} ${body}`.trim();
      if (JsonRpcLedgerClient.RETRYABLE_STATUSES.has(response.status)) {
        return retryable(reason, parseRetryAfterMs(response.headers.get('retry-after')));
      }
      return fatal(reason);
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      return retryable(`${endpoint} returned invalid JSON: ${getErrorMessage(error)}`);
    }

    const parsed = rpcResponseSchema.safeParse(raw);
    if (!parsed.success) {
      return retryable(`Unexpected JSON-RPC response from ${endpoint}: ${parsed.error.message}`);
    }

    if ('error' in parsed.data) {
      const { code, message } = parsed.data.error;
      const reason = `RPC error ${code}: ${message}`;
      logDebug(`${endpoint} rejected operation ${operation.id}`, parsed.data.error);
      if (FATAL_RPC_CODES.has(code) || FATAL_RPC_MESSAGES.test(message)) {
        return fatal(reason);
      }
      // Per-block operation limits, resource credits and bandwidth errors clear up on their own.
      return retryable(reason);
    }

    return { ok: true, transactionId: parsed.data.result.id };
  }
}

function retryable(reason: string, retryAfterMs: number | null = null): LedgerSubmitResult {
  if (retryAfterMs === null) {
    return { ok: false, failure: { kind: 'retryable', reason } };
  }
  return { ok: false, failure: { kind: 'retryable', reason, retryAfterMs } };
}

function fatal(reason: string): LedgerSubmitResult {
  return { ok: false, failure: { kind: 'fatal', reason } };
}
