import { z } from 'zod';
import { envelopeBytes } from './ledger/operation.js';
import type { LogLevel } from './logger.js';
import { MEDIA, REASONS, type Medium, type Reason } from './types.js';

export interface AppConfig {
  ledger: {
    endpoints: string[];
    account: string;
    requestTimeoutMs: number;
    rpcMethod: string;
    dryRun: boolean;
    startupCheck: boolean;
    signer: {
      url: string | null;
      token: string;
    };
  };
  operation: {
    idPrefix: string;
    medium: Medium;
    reason: Reason;
    maxBytes: number;
  };
  batch: {
    maxItems: number;
    maxWaitMs: number;
    maxBytes: number;
  };
  queueCapacity: number;
  dispatch: {
    concurrency: number;
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    maxTotalBackoffMs: number;
  };
  endpointHealth: {
    quarantineThreshold: number;
    quarantineCooldownMs: number;
  };
  ipc: {
    host: string;
    port: number;
    socketPath: string | null;
    awaitTimeoutMs: number;
    maxLineBytes: number;
  };
  outcomeRetention: number;
  statusReportIntervalMs: number;
  logLevel: LogLevel;
}

const booleanFlag = (fallback: '0' | '1') =>
  z
    .enum(['0', '1', 'true', 'false'])
    .default(fallback)
    .transform((value) => value === '1' || value === 'true');

const envSchema = z.object({
  LEDGER_ENDPOINTS: z
    .string()
    .default('http://127.0.0.1:8091')
    .transform((value) => [
      ...new Set(
        value
          .split(',')
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0),
      ),
    ])
    .pipe(z.array(z.string().url()).min(1)),
  LEDGER_ACCOUNT: z.string().trim().min(1),
  LEDGER_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(15_000),
  LEDGER_RPC_METHOD: z.string().min(1).default('condenser_api.broadcast_transaction_synchronous'),
  SIGNER_URL: z.string().url().optional(),
  SIGNER_TOKEN: z.string().default(''),
  DRY_RUN: booleanFlag('0'),
  STARTUP_CHECK: booleanFlag('1'),
  OPERATION_ID_PREFIX: z
    .string()
    .min(1)
    .max(16)
    .regex(/^[a-z0-9-]+$/)
    .default('pp'),
  NOTIFICATION_MEDIUM: z.enum(MEDIA).default('podcast'),
  NOTIFICATION_REASON: z.enum(REASONS).default('update'),
  OPERATION_MAX_BYTES: z.coerce.number().int().min(256).max(65_536).default(8192),
  BATCH_MAX_ITEMS: z.coerce.number().int().min(1).max(10_000).default(100),
  BATCH_MAX_WAIT_MS: z.coerce.number().int().min(10).max(600_000).default(3000),
  BATCH_MAX_BYTES: z.coerce.number().int().min(256).max(65_536).default(7000),
  QUEUE_CAPACITY: z.coerce.number().int().min(1).max(10_000_000).default(10_000),
  DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  DISPATCH_MAX_RETRIES: z.coerce.number().int().min(0).max(1000).default(5),
  DISPATCH_INITIAL_BACKOFF_MS: z.coerce.number().int().min(0).max(600_000).default(1000),
  DISPATCH_MAX_BACKOFF_MS: z.coerce.number().int().min(0).max(3_600_000).default(60_000),
  DISPATCH_MAX_TOTAL_BACKOFF_MS: z.coerce.number().int().min(0).max(86_400_000).default(300_000),
  ENDPOINT_QUARANTINE_THRESHOLD: z.coerce.number().int().min(1).max(100).default(3),
  ENDPOINT_QUARANTINE_COOLDOWN_MS: z.coerce.number().int().min(0).max(86_400_000).default(60_000),
  IPC_HOST: z.string().min(1).default('127.0.0.1'),
  IPC_PORT: z.coerce.number().int().min(0).max(65535).default(9999),
  IPC_SOCKET_PATH: z.string().min(1).optional(),
  IPC_AWAIT_TIMEOUT_MS: z.coerce.number().int().min(1).max(86_400_000).default(60_000),
  IPC_MAX_LINE_BYTES: z.coerce.number().int().min(1024).max(16 * 1024 * 1024).default(65_536),
  OUTCOME_RETENTION: z.coerce.number().int().min(1).max(1_000_000).default(1000),
  STATUS_REPORT_INTERVAL_MS: z.coerce.number().int().min(0).max(86_400_000).default(60_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (!parsed.DRY_RUN && !parsed.SIGNER_URL) {
    throw new Error('SIGNER_URL is required unless DRY_RUN is enabled');
  }
  const envelope = envelopeBytes(parsed.NOTIFICATION_MEDIUM, parsed.NOTIFICATION_REASON);
  if (parsed.BATCH_MAX_BYTES > parsed.OPERATION_MAX_BYTES - envelope) {
    throw new Error(
      `BATCH_MAX_BYTES (${parsed.BATCH_MAX_BYTES}) must not exceed OPERATION_MAX_BYTES (${parsed.OPERATION_MAX_BYTES}) ` +
        `minus the ${envelope}-byte payload envelope`,
    );
  }
  if (parsed.DISPATCH_MAX_BACKOFF_MS < parsed.DISPATCH_INITIAL_BACKOFF_MS) {
    throw new Error('DISPATCH_MAX_BACKOFF_MS must be at least DISPATCH_INITIAL_BACKOFF_MS');
  }

  return {
    ledger: {
      endpoints: parsed.LEDGER_ENDPOINTS,
      account: parsed.LEDGER_ACCOUNT,
      requestTimeoutMs: parsed.LEDGER_REQUEST_TIMEOUT_MS,
      rpcMethod: parsed.LEDGER_RPC_METHOD,
      dryRun: parsed.DRY_RUN,
      startupCheck: parsed.STARTUP_CHECK,
      signer: {
        url: parsed.SIGNER_URL ?? null,
        token: parsed.SIGNER_TOKEN.trim(),
      },
    },
    operation: {
      idPrefix: parsed.OPERATION_ID_PREFIX,
      medium: parsed.NOTIFICATION_MEDIUM,
      reason: parsed.NOTIFICATION_REASON,
      maxBytes: parsed.OPERATION_MAX_BYTES,
    },
    batch: {
      maxItems: parsed.BATCH_MAX_ITEMS,
      maxWaitMs: parsed.BATCH_MAX_WAIT_MS,
      maxBytes: parsed.BATCH_MAX_BYTES,
    },
    queueCapacity: parsed.QUEUE_CAPACITY,
    dispatch: {
      concurrency: parsed.DISPATCH_CONCURRENCY,
      maxRetries: parsed.DISPATCH_MAX_RETRIES,
      initialBackoffMs: parsed.DISPATCH_INITIAL_BACKOFF_MS,
      maxBackoffMs: parsed.DISPATCH_MAX_BACKOFF_MS,
      maxTotalBackoffMs: parsed.DISPATCH_MAX_TOTAL_BACKOFF_MS,
    },
    endpointHealth: {
      quarantineThreshold: parsed.ENDPOINT_QUARANTINE_THRESHOLD,
      quarantineCooldownMs: parsed.ENDPOINT_QUARANTINE_COOLDOWN_MS,
    },
    ipc: {
      host: parsed.IPC_HOST,
      port: parsed.IPC_PORT,
      socketPath: parsed.IPC_SOCKET_PATH ?? null,
      awaitTimeoutMs: parsed.IPC_AWAIT_TIMEOUT_MS,
      maxLineBytes: parsed.IPC_MAX_LINE_BYTES,
    },
    outcomeRetention: parsed.OUTCOME_RETENTION,
    statusReportIntervalMs: parsed.STATUS_REPORT_INTERVAL_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
