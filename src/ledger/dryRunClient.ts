import { createHash } from 'node:crypto';
import { logInfo } from '../logger.js';
import type { LedgerSubmitResult } from '../types.js';
import type { LedgerClient } from './client.js';
import type { LedgerOperation } from './operation.js';

/** Accepts every operation without touching the network. */
export class DryRunLedgerClient implements LedgerClient {
  private submitted = 0;

  get submissions(): number {
    return this.submitted;
  }

  async submit(operation: LedgerOperation, endpoint: string): Promise<LedgerSubmitResult> {
    this.submitted += 1;
    const digest = createHash('sha256').update(`${endpoint}\n${operation.json}`).digest('hex');
    const transactionId = `dryrun-${digest.slice(0, 16)}`;
    logInfo(`Dry run: ${operation.id} via ${endpoint} (${operation.json.length} bytes) -> ${transactionId}`);
    return { ok: true, transactionId };
  }
}
