import net from 'node:net';
import { AdapterError } from '@/domain/errors';
import { LineFramer } from '@/shared/lineFramer';
import { createLogger } from '@/shared/logging/logger';
import { safeJsonParse } from '@/shared/bestEffort';
import { isRecord } from '@/shared/utils/isRecord';

const MAX_IPC_LINE_BYTES = 1024 * 1024;

type PendingEntry = {
  resolve: (value: unknown) => void;
  reject: (reason: AdapterError) => void;
  timer: NodeJS.Timeout;
  command: string;
};

type IpcReply = Record<string, unknown>;

export type MpvEvent = { event: string } & Record<string, unknown>;

/**
 * JSON-lines client for mpv's `--input-ipc-server` socket. Replies are matched
 * to requests through `request_id`; unsolicited lines are events.
 */
export class MpvIpcClient {
  private readonly log = createLogger('Playback', 'MpvIpc');
  private readonly pending = new Map<number, PendingEntry>();
  private readonly eventHandlers = new Set<(event: MpvEvent) => void>();
  private readonly framer = new LineFramer(MAX_IPC_LINE_BYTES);
  private socket: net.Socket | null = null;
  private nextRequestId = 1;

  constructor(private readonly ipcPath: string) {}

  public get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  public connect(): Promise<void> {
    if (this.connected) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const socket = net.createConnection(this.ipcPath);
      let settled = false;
      socket.once('connect', () => {
        settled = true;
        this.socket = socket;
        this.log.debug('mpv ipc connected', { ipcPath: this.ipcPath });
        resolve();
      });
      socket.on('data', (chunk: Buffer) => this.handleData(chunk));
      socket.on('error', (error) => {
        if (!settled) {
          settled = true;
          reject(new AdapterError('ipc_error', `cannot connect to mpv ipc: ${error.message}`));
          return;
        }
        this.log.warn('mpv ipc socket error', { message: error.message });
      });
      socket.on('close', () => {
        if (this.socket === socket) {
          this.socket = null;
        }
        this.failPending(new AdapterError('ipc_error', 'mpv ipc connection closed'));
      });
    });
  }

  public onEvent(handler: (event: MpvEvent) => void): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  /**
   * Sends `{ command: [...] }` and resolves with the reply's `data` field.
   */
  public command(args: Array<string | number | boolean>, timeoutMs: number): Promise<unknown> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(new AdapterError('ipc_error', 'mpv ipc not connected'));
    }
    const requestId = this.nextRequestId++;
    const name = String(args[0] ?? '');
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new AdapterError('timeout', `mpv ${name} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      this.pending.set(requestId, { resolve, reject, timer, command: name });
      socket.write(`${JSON.stringify({ command: args, request_id: requestId })}\n`);
    });
  }

  public close(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.destroy();
    this.failPending(new AdapterError('ipc_error', 'mpv ipc connection closed'));
  }

  private handleData(chunk: Buffer): void {
    for (const frame of this.framer.push(chunk)) {
      if (frame.kind === 'overflow') {
        this.log.warn('mpv ipc line too long; dropped', { bytes: frame.bytes });
        continue;
      }
      if (!frame.line.trim()) continue;
      const reply = safeJsonParse(frame.line, null, {
        log: this.log,
        label: 'unparseable mpv ipc line',
      });
      if (isRecord(reply)) {
        this.handleReply(reply);
      }
    }
  }

  private handleReply(reply: IpcReply): void {
    if (typeof reply.event === 'string') {
      const event: MpvEvent = { ...reply, event: reply.event };
      for (const handler of this.eventHandlers) {
        handler(event);
      }
      return;
    }
    if (typeof reply.request_id !== 'number') {
      return;
    }
    const entry = this.pending.get(reply.request_id);
    if (!entry) {
      return;
    }
    this.pending.delete(reply.request_id);
    clearTimeout(entry.timer);
    if (reply.error === 'success') {
      entry.resolve(reply.data);
    } else {
      entry.reject(new AdapterError('ipc_error', `mpv ${entry.command}: ${String(reply.error)}`));
    }
  }

  private failPending(error: AdapterError): void {
    for (const [requestId, entry] of this.pending) {
      clearTimeout(entry.timer);
      this.pending.delete(requestId);
      entry.reject(error);
    }
  }
}
