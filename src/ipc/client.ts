import { connect, type Socket } from 'node:net';
import { logWarn } from '../logger.js';
import type { SubmitMode } from '../types.js';
import type { IpcListenTarget } from './server.js';
import { encodeMessage, parseResponseLine, splitLines, type IpcRequestInput, type IpcResponse } from './protocol.js';

interface PendingRequest {
  resolve: (value: IpcResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface IpcClientOptions {
  target: IpcListenTarget;
  /** Client-side deadline on top of the server's await timeout. */
  requestTimeoutMs?: number;
}

/** Client for the dispatcher's IPC server; correlates responses by request id. */
export class IpcClient {
  private readonly opts: IpcClientOptions;
  private readonly requestTimeoutMs: number;
  private readonly pending = new Map<number, PendingRequest>();
  private socket: Socket | null = null;
  private buffer = '';
  private nextId = 1;

  constructor(opts: IpcClientOptions) {
    this.opts = opts;
    this.requestTimeoutMs = Math.max(100, opts.requestTimeoutMs ?? 120_000);
  }

  async connect(): Promise<void> {
    if (this.socket) {
      return;
    }

    const socket =
      'socketPath' in this.opts.target
        ? connect(this.opts.target.socketPath)
        : connect(this.opts.target.port, this.opts.target.host);

    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.off('error', reject);
        resolve();
      });
    });

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      this.handleData(chunk);
    });
    socket.on('error', (error) => {
      this.rejectPending(error);
    });
    socket.on('close', () => {
      this.socket = null;
      this.rejectPending(new Error('IPC connection closed'));
    });
    this.socket = socket;
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
    });
  }

  submit(identifier: string, mode: SubmitMode = 'fire_and_forget', timeoutMs?: number): Promise<IpcResponse> {
    return this.request({ kind: 'submit', identifier, mode, timeoutMs });
  }

  status(sequence: number): Promise<IpcResponse> {
    return this.request({ kind: 'status', sequence });
  }

  stats(): Promise<IpcResponse> {
    return this.request({ kind: 'stats' });
  }

  private request(body: IpcRequestInput): Promise<IpcResponse> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error('IPC client is not connected'));
    }

    const id = this.nextId++;
    const result = new Promise<IpcResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`IPC request timed out: ${body.kind}`));
      }, this.requestTimeoutMs);
      this.pending.set(id, { resolve, reject, timer });
    });

    socket.write(encodeMessage({ ...body, id }));
    return result;
  }

  private handleData(chunk: string): void {
    const { lines, rest } = splitLines(this.buffer + chunk);
    this.buffer = rest;

    for (const line of lines) {
      const response = parseResponseLine(line);
      if (!response || typeof response.id !== 'number') {
        logWarn('Ignoring uncorrelated IPC response', line);
        continue;
      }
      const pending = this.pending.get(response.id);
      if (!pending) {
        logWarn(`Unexpected IPC response id=${response.id}`);
        continue;
      }
      this.pending.delete(response.id);
      clearTimeout(pending.timer);
      pending.resolve(response);
    }
  }

  private rejectPending(error: Error): void {
    for (const [id, pending] of this.pending.entries()) {
      clearTimeout(pending.timer);
      pending.reject(error);
      this.pending.delete(id);
    }
  }
}
