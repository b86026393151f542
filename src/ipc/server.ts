import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import type { DispatchEngine } from '../engine.js';
import { AwaitTimeoutError, DispatchError } from '../errors.js';
import { logDebug, logError, logInfo, logWarn } from '../logger.js';
import { getErrorMessage } from '../utils.js';
import {
  AWAIT_TIMEOUT_REASON,
  LEGACY_INVALID,
  LEGACY_OK,
  encodeMessage,
  ipcRequestSchema,
  outcomeToResponse,
  requestIdOf,
  splitLines,
  type IpcRequest,
  type IpcResponse,
  type IpcResponseBody,
} from './protocol.js';

type IpcEngine = Pick<DispatchEngine, 'submit' | 'submitAndWait' | 'status' | 'stats'>;

export type IpcListenTarget = { host: string; port: number } | { socketPath: string };

interface IpcServerOptions {
  engine: IpcEngine;
  listen: IpcListenTarget;
  awaitTimeoutMs: number;
  maxLineBytes?: number;
}

/**
 * Newline-delimited JSON request server in front of the dispatch engine.
 * Requests on a connection are handled concurrently; responses carry the
 * request id so callers can match them.
 */
export class IpcServer {
  private readonly opts: IpcServerOptions;
  private readonly maxLineBytes: number;
  private readonly sockets = new Set<Socket>();
  private server: Server | null = null;

  constructor(opts: IpcServerOptions) {
    this.opts = opts;
    this.maxLineBytes = Math.max(1024, Math.floor(opts.maxLineBytes ?? 64 * 1024));
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    this.server = createServer((socket) => {
      this.handleConnection(socket);
    });

    await new Promise<void>((resolve, reject) => {
      if (!this.server) {
        reject(new Error('IPC server missing'));
        return;
      }
      this.server.once('error', reject);
      const onListening = (): void => {
        this.server?.off('error', reject);
        resolve();
      };
      if ('socketPath' in this.opts.listen) {
        this.server.listen(this.opts.listen.socketPath, onListening);
      } else {
        this.server.listen(this.opts.listen.port, this.opts.listen.host, onListening);
      }
    });

    logInfo(`IPC server listening on ${this.describeAddress()}`);
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }
    const server = this.server;
    this.server = null;
    for (const socket of this.sockets) {
      socket.end();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      for (const socket of this.sockets) {
        socket.destroy();
      }
    });
  }

  address(): AddressInfo | string | null {
    return this.server?.address() ?? null;
  }

  /** Answers one decoded request. Exposed for callers that bring their own transport. */
  async handleRequest(raw: unknown): Promise<IpcResponse> {
    const parsed = ipcRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const id = requestIdOf(raw);
      const body: IpcResponseBody = {
        status: 'error',
        reason: `invalid request: ${parsed.error.issues[0]?.message ?? 'malformed'}`,
      };
      return id === undefined ? body : { id, ...body };
    }

    const request = parsed.data;
    const body = await this.dispatchRequest(request);
    return request.id === undefined ? body : { id: request.id, ...body };
  }

  /** Legacy mode: a bare identifier line, answered with a bare text line. */
  handleLegacyLine(line: string): string {
    try {
      this.opts.engine.submit(line);
      return LEGACY_OK;
    } catch (error) {
      if (error instanceof DispatchError && error.code === 'invalid_identifier') {
        return LEGACY_INVALID;
      }
      return getErrorMessage(error);
    }
  }

  private async dispatchRequest(request: IpcRequest): Promise<IpcResponseBody> {
    switch (request.kind) {
      case 'submit':
        return await this.handleSubmit(request.identifier, request.mode, request.timeoutMs);
      case 'status':
        return outcomeToResponse(this.opts.engine.status(request.sequence));
      case 'stats':
        return { status: 'stats', ...this.opts.engine.stats() };
    }
  }

  private async handleSubmit(
    identifier: string,
    mode: 'fire_and_forget' | 'await',
    timeoutMs: number | undefined,
  ): Promise<IpcResponseBody> {
    try {
      if (mode === 'fire_and_forget') {
        const ack = this.opts.engine.submit(identifier);
        return { status: 'accepted', duplicate: ack.duplicate };
      }
      const outcome = await this.opts.engine.submitAndWait(identifier, timeoutMs ?? this.opts.awaitTimeoutMs);
      return outcomeToResponse(outcome);
    } catch (error) {
      if (error instanceof AwaitTimeoutError) {
        return error.sequence === null
          ? { status: 'pending', reason: AWAIT_TIMEOUT_REASON }
          : { status: 'pending', sequence: error.sequence, reason: AWAIT_TIMEOUT_REASON };
      }
      if (error instanceof DispatchError) {
        return { status: 'rejected', code: error.code, reason: error.message };
      }
      logError('IPC submit failed', error);
      return { status: 'error', reason: 'internal error' };
    }
  }

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket);
    socket.setEncoding('utf8');
    let buffer = '';
    let closing = false;

    socket.on('data', (chunk: string) => {
      if (closing) {
        return;
      }
      const { lines, rest } = splitLines(buffer + chunk);
      buffer = rest;

      for (const line of lines) {
        if (Buffer.byteLength(line, 'utf8') > this.maxLineBytes) {
          closing = true;
          this.rejectOversizedLine(socket);
          return;
        }
        void this.handleLine(socket, line);
      }

      if (Buffer.byteLength(buffer, 'utf8') > this.maxLineBytes) {
        closing = true;
        this.rejectOversizedLine(socket);
      }
    });

    socket.on('error', (error) => {
      logDebug('IPC connection error', error);
    });

    socket.on('close', () => {
      this.sockets.delete(socket);
    });
  }

  private rejectOversizedLine(socket: Socket): void {
    logWarn(`Closing IPC connection: request line exceeds ${this.maxLineBytes} bytes`);
    this.write(socket, encodeMessage({ status: 'error', reason: 'request too large' }));
    socket.end();
  }

  private async handleLine(socket: Socket, line: string): Promise<void> {
    if (!line.startsWith('{')) {
      this.write(socket, `${this.handleLegacyLine(line)}\n`);
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      this.write(socket, encodeMessage({ status: 'error', reason: `invalid JSON: ${getErrorMessage(error)}` }));
      return;
    }

    try {
      const response = await this.handleRequest(raw);
      this.write(socket, encodeMessage(response));
    } catch (error) {
      logError('IPC request handler failed', error);
      this.write(socket, encodeMessage({ status: 'error', reason: 'internal error' }));
    }
  }

  private write(socket: Socket, payload: string): void {
    // An await-mode caller may have hung up; the dispatch goes on regardless.
    if (socket.destroyed || !socket.writable) {
      return;
    }
    socket.write(payload);
  }

  private describeAddress(): string {
    if ('socketPath' in this.opts.listen) {
      return this.opts.listen.socketPath;
    }
    const address = this.address();
    if (address && typeof address === 'object') {
      return `tcp://${address.address}:${address.port}`;
    }
    return `tcp://${this.opts.listen.host}:${this.opts.listen.port}`;
  }
}
