import type net from 'node:net';
import { ProtocolError } from '@/domain/errors';
import type { Command, Response } from '@/domain/protocol/types';
import type { AuthState } from '@/application/dispatch/authPolicy';
import type { CommandDispatcher, DispatchOutcome } from '@/application/dispatch/commandDispatcher';
import { decodeCommand, encodeResponse } from '@/adapters/control/protocol/codec';
import { LineFramer, type Frame } from '@/shared/lineFramer';
import { errorMessage, type Logger } from '@/shared/logging/logger';

const CLOSE_GRACE_MS = 1000;

export type ClientConnectionOptions = {
  id: number;
  socket: net.Socket;
  dispatcher: CommandDispatcher;
  maxLineBytes: number;
  /** 0 disables the idle timeout. */
  idleTimeoutMs: number;
  log: Logger;
  onClose: (connection: ClientConnection) => void;
};

/**
 * One control client. Lines are handled strictly one after another: the
 * response to a line is written before the next line is decoded.
 *
 * Reading is paused while lines are waiting to be handled or while the
 * client has not taken its earlier responses, so a client that pipelines
 * without reading holds at most one read chunk of work.
 */
export class ClientConnection implements AuthState {
  public authenticated = false;
  public readonly id: number;
  private readonly socket: net.Socket;
  private readonly framer: LineFramer;
  private readonly log: Logger;
  private readonly closed: Promise<void>;
  private chain: Promise<void> = Promise.resolve();
  /** New lines are read while set. */
  private accepting = true;
  /** Set once no further response may be written. */
  private finished = false;
  private pendingFrames = 0;
  /** The last write filled the socket's buffer; cleared on `drain`. */
  private backlogged = false;

  constructor(private readonly options: ClientConnectionOptions) {
    this.id = options.id;
    this.socket = options.socket;
    this.framer = new LineFramer(options.maxLineBytes);
    this.log = options.log;
    this.closed = new Promise((resolve) => {
      this.socket.once('close', () => {
        this.accepting = false;
        this.finished = true;
        this.log.debug('client disconnected', { connection: this.id });
        options.onClose(this);
        resolve();
      });
    });

    this.socket.on('data', (chunk: Buffer) => this.handleData(chunk));
    this.socket.on('drain', () => {
      this.backlogged = false;
      this.updateFlow();
    });
    // The server runs half-open: answer what was sent before the client's FIN.
    this.socket.on('end', () => {
      this.accepting = false;
      this.chain = this.chain.then(() => {
        if (!this.socket.destroyed) {
          this.socket.end();
        }
      });
    });
    this.socket.on('error', (error) => {
      this.log.debug('client socket error', { connection: this.id, message: error.message });
    });
    if (options.idleTimeoutMs > 0) {
      this.socket.setTimeout(options.idleTimeoutMs);
      this.socket.on('timeout', () => {
        this.log.info('closing idle client', { connection: this.id, idleTimeoutMs: options.idleTimeoutMs });
        this.socket.destroy();
      });
    }
  }

  /** Whether the connection still accepts lines. */
  public get open(): boolean {
    return this.accepting && !this.socket.destroyed;
  }

  /**
   * Writes a single envelope and half-closes the socket.
   */
  public reject(response: Response): void {
    this.accepting = false;
    this.finished = true;
    this.updateFlow();
    this.socket.end(encodeResponse(response));
  }

  /**
   * Stops reading, lets lines already received finish, then closes the
   * socket. Resolves once closed.
   */
  public async close(): Promise<void> {
    this.accepting = false;
    this.updateFlow();
    await this.chain;
    if (!this.socket.destroyed) {
      this.socket.end();
      const force = setTimeout(() => this.socket.destroy(), CLOSE_GRACE_MS);
      await this.closed;
      clearTimeout(force);
    }
  }

  private handleData(chunk: Buffer): void {
    if (!this.accepting) {
      return;
    }
    for (const frame of this.framer.push(chunk)) {
      if (frame.kind === 'line' && !frame.line.trim()) {
        continue;
      }
      this.pendingFrames += 1;
      this.chain = this.chain
        .then(() => this.handleFrame(frame))
        .catch((error: unknown) => {
          this.log.error('client connection failed', { connection: this.id, message: errorMessage(error) });
          this.socket.destroy();
        })
        .finally(() => {
          this.pendingFrames -= 1;
          this.updateFlow();
        });
    }
    this.updateFlow();
  }

  /** Pauses reading while work is queued; a closing connection drains input. */
  private updateFlow(): void {
    if (this.socket.destroyed) {
      return;
    }
    const hold = this.accepting && (this.pendingFrames > 0 || this.backlogged);
    if (hold && !this.socket.isPaused()) {
      this.socket.pause();
    } else if (!hold && this.socket.isPaused()) {
      this.socket.resume();
    }
  }

  private async handleFrame(frame: Frame): Promise<void> {
    if (this.finished || this.socket.destroyed) {
      return;
    }
    const outcome = await this.process(frame);
    if (this.finished || this.socket.destroyed) {
      return;
    }
    const payload = encodeResponse(outcome.response);
    if (outcome.close) {
      this.log.warn('closing client after failed authentication', { connection: this.id });
      this.accepting = false;
      this.finished = true;
      this.updateFlow();
      this.socket.end(payload);
      return;
    }
    if (!this.socket.write(payload)) {
      this.backlogged = true;
    }
  }

  private async process(frame: Frame): Promise<DispatchOutcome> {
    const dispatcher = this.options.dispatcher;
    if (frame.kind === 'overflow') {
      const error = new ProtocolError(`line exceeds ${this.options.maxLineBytes} bytes`);
      return { response: dispatcher.errorResponse(error), close: false };
    }
    let command: Command;
    try {
      command = decodeCommand(frame.line, { maxLineBytes: this.options.maxLineBytes });
    } catch (error) {
      return { response: dispatcher.errorResponse(error), close: false };
    }
    this.log.spam('command received', { connection: this.id, command: command.cmd });
    return dispatcher.dispatch(command, this);
  }
}
