import type { LedgerSubmitResult } from '../types.js';
import type { LedgerOperation } from './operation.js';

/**
 * Performs one ledger write against one endpoint. Implementations either
 * return a classified failure or throw `RetryableDispatchFailure` /
 * `FatalDispatchFailure`; anything else thrown counts as retryable.
 */
export interface LedgerClient {
  submit(operation: LedgerOperation, endpoint: string): Promise<LedgerSubmitResult>;
}
