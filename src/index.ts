import { loadConfig, type AppConfig } from './config.js';
import { DispatchBroadcaster } from './dispatch/broadcaster.js';
import { EndpointPool } from './endpoints/endpointPool.js';
import { DispatchEngine } from './engine.js';
import { IpcServer, type IpcListenTarget } from './ipc/server.js';
import type { LedgerClient } from './ledger/client.js';
import { DryRunLedgerClient } from './ledger/dryRunClient.js';
import { JsonRpcLedgerClient } from './ledger/jsonRpcClient.js';
import { HttpTransactionSigner } from './ledger/signer.js';
import { runStartupCheck } from './ledger/startupCheck.js';
import { logError, logInfo, setLogLevel } from './logger.js';

function createLedgerClient(config: AppConfig): LedgerClient {
  if (config.ledger.dryRun) {
    return new DryRunLedgerClient();
  }
  if (!config.ledger.signer.url) {
    throw new Error('SIGNER_URL is required unless DRY_RUN is enabled');
  }
  return new JsonRpcLedgerClient({
    signer: new HttpTransactionSigner({
      url: config.ledger.signer.url,
      token: config.ledger.signer.token,
      requestTimeoutMs: config.ledger.requestTimeoutMs,
    }),
    method: config.ledger.rpcMethod,
    requestTimeoutMs: config.ledger.requestTimeoutMs,
  });
}

function listenTarget(config: AppConfig): IpcListenTarget {
  if (config.ipc.socketPath) {
    return { socketPath: config.ipc.socketPath };
  }
  return { host: config.ipc.host, port: config.ipc.port };
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const pool = new EndpointPool({
    addresses: config.ledger.endpoints,
    quarantineThreshold: config.endpointHealth.quarantineThreshold,
    quarantineCooldownMs: config.endpointHealth.quarantineCooldownMs,
  });

  const ledger = createLedgerClient(config);
  const operation = {
    account: config.ledger.account,
    operationIdPrefix: config.operation.idPrefix,
    medium: config.operation.medium,
    reason: config.operation.reason,
    maxPayloadBytes: config.operation.maxBytes,
  };

  const broadcaster = new DispatchBroadcaster({
    pool,
    ledger,
    operation,
    concurrency: config.dispatch.concurrency,
    maxRetries: config.dispatch.maxRetries,
    initialBackoffMs: config.dispatch.initialBackoffMs,
    maxBackoffMs: config.dispatch.maxBackoffMs,
    maxTotalBackoffMs: config.dispatch.maxTotalBackoffMs,
    jitterRatio: 0.2,
  });

  const engine = new DispatchEngine({
    pool,
    broadcaster,
    batch: config.batch,
    queueCapacity: config.queueCapacity,
    awaitTimeoutMs: config.ipc.awaitTimeoutMs,
    maxRetainedOutcomes: config.outcomeRetention,
    statusReportIntervalMs: config.statusReportIntervalMs,
  });

  const ipcServer = new IpcServer({
    engine,
    listen: listenTarget(config),
    awaitTimeoutMs: config.ipc.awaitTimeoutMs,
    maxLineBytes: config.ipc.maxLineBytes,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo(`Received ${signal}, draining queue and in-flight batches...`);

    let exitCode = 0;
    try {
      await ipcServer.stop();
      await engine.stop();
    } catch (error) {
      logError('Shutdown error', error);
      exitCode = 1;
    } finally {
      process.exit(exitCode);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logInfo('Starting feed update ledger dispatcher');
  logInfo(`Account: @${config.ledger.account}`);
  logInfo(`Endpoints: ${config.ledger.endpoints.join(', ')}`);
  logInfo(`Dry run: ${config.ledger.dryRun}`);
  logInfo(`Batch: ${config.batch.maxItems} items / ${config.batch.maxBytes} bytes / ${config.batch.maxWaitMs}ms`);
  logInfo(`Dispatch concurrency: ${config.dispatch.concurrency}, max retries: ${config.dispatch.maxRetries}`);

  if (config.ledger.startupCheck && !config.ledger.dryRun) {
    await runStartupCheck({ pool, ledger, operation });
  }

  engine.start();
  await ipcServer.start();
}

void main().catch((error) => {
  logError('Fatal startup error', error);
  process.exit(1);
});
