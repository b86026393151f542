import { randomUUID } from 'node:crypto';
import type { EndpointPool } from '../endpoints/endpointPool.js';
import { StartupCheckError, classifyError } from '../errors.js';
import { logInfo, logWarn } from '../logger.js';
import type { ClassifiedFailure } from '../types.js';
import { getErrorMessage, nowMs } from '../utils.js';
import type { LedgerClient } from './client.js';
import { buildStartupOperation, type OperationOptions } from './operation.js';

export interface StartupCheckOptions {
  pool: EndpointPool;
  ledger: LedgerClient;
  operation: OperationOptions;
  clock?: () => number;
  createId?: () => string;
}

export interface StartupCheckResult {
  endpoint: string;
  transactionId: string;
  latencyMs: number;
  attempts: number;
}

/**
 * Broadcasts one `<prefix>_startup` operation before the daemon starts
 * serving. Each endpoint is tried at most once; a fatal rejection (missing
 * authority, bad key) fails the check straight away.
 */
export async function runStartupCheck(opts: StartupCheckOptions): Promise<StartupCheckResult> {
  const clock = opts.clock ?? nowMs;
  const uuid = (opts.createId ?? randomUUID)();
  const maxAttempts = opts.pool.snapshot().length;
  const tried = new Set<string>();
  let lastEndpoint: string | null = null;
  let lastReason = 'no endpoint was tried';

  logInfo(`Startup check: broadcasting a test operation as @${opts.operation.account}`);

  while (tried.size < maxAttempts) {
    let endpoint: string;
    try {
      endpoint = opts.pool.select({ avoid: lastEndpoint }).address;
    } catch (error) {
      throw new StartupCheckError(getErrorMessage(error));
    }
    if (tried.has(endpoint)) {
      break;
    }
    tried.add(endpoint);
    lastEndpoint = endpoint;

    const operation = buildStartupOperation(opts.operation, { message: 'Startup check', uuid, endpoint });
    const startedAtMs = clock();
    let failure: ClassifiedFailure;
    try {
      const result = await opts.ledger.submit(operation, endpoint);
      if (result.ok) {
        const latencyMs = clock() - startedAtMs;
        opts.pool.report(endpoint, 'success');
        logInfo(`Startup check passed via ${endpoint} in ${latencyMs}ms (tx ${result.transactionId})`);
        return { endpoint, transactionId: result.transactionId, latencyMs, attempts: tried.size };
      }
      failure = result.failure;
    } catch (error) {
      failure = classifyError(error);
    }

    if (failure.kind === 'fatal') {
      throw new StartupCheckError(`${endpoint} rejected the startup operation: ${failure.reason}`);
    }
    opts.pool.report(endpoint, 'failure');
    lastReason = failure.reason;
    logWarn(`Startup check via ${endpoint} failed: ${failure.reason}`);
  }

  throw new StartupCheckError(`no endpoint accepted the startup operation after ${tried.size} attempts: ${lastReason}`);
}
