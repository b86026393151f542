import { z } from 'zod';
import { FatalDispatchFailure, RetryableDispatchFailure } from '../errors.js';
import { getErrorMessage } from '../utils.js';
import { fetchWithTimeout } from './http.js';
import type { LedgerOperation } from './operation.js';

export interface TransactionSigner {
  sign(operation: LedgerOperation): Promise<Record<string, unknown>>;
}

interface HttpTransactionSignerConfig {
  url: string;
  token: string;
  requestTimeoutMs?: number;
}

const signResponseSchema = z.object({
  transaction: z.record(z.string(), z.unknown()),
});

/**
 * Delegates signing to a key-custody service. The service receives the
 * unsigned operations and answers with a signed transaction object.
 */
export class HttpTransactionSigner implements TransactionSigner {
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 5_000;

  private readonly url: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;

  constructor(config: HttpTransactionSignerConfig) {
    this.url = config.url;
    this.token = config.token;
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? HttpTransactionSigner.DEFAULT_REQUEST_TIMEOUT_MS);
  }

  async sign(operation: LedgerOperation): Promise<Record<string, unknown>> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.token.length > 0) {
      headers.authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.url,
        {
          method: 'POST',
          headers,
          body: JSON.stringify({ operations: [toWireOperation(operation)] }),
        },
        this.requestTimeoutMs,
      );
    } catch (error) {
      throw new RetryableDispatchFailure(`Signer unreachable: ${getErrorMessage(error)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      if (response.status >= 400 && response.status < 500 && response.status !== 429) {
        throw new FatalDispatchFailure(`Signer refused operation: ${response.status} ${body}`);
      }
      throw new RetryableDispatchFailure(`Signer failed: ${response.status} ${body}`);
    }

    const parsed = signResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new FatalDispatchFailure(`Unexpected signer response: ${parsed.error.message}`);
    }
    return parsed.data.transaction;
  }
}

function toWireOperation(operation: LedgerOperation): [string, Record<string, unknown>] {
  return [
    operation.type,
    {
      required_auths: operation.requiredAuths,
      required_posting_auths: operation.requiredPostingAuths,
      id: operation.id,
      json: operation.json,
    },
  ];
}
