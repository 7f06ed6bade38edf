import { promises as fs, type Stats } from 'node:fs';
import net from 'node:net';
import path from 'node:path';
import type { ProtocolConfig } from '@/domain/config/types';
import type { CommandDispatcher } from '@/application/dispatch/commandDispatcher';
import { ClientConnection } from '@/adapters/control/clientConnection';
import { ensureDir, isMissingFileError } from '@/shared/utils/file';
import { createLogger, type Logger } from '@/shared/logging/logger';

const SOCKET_MODE = 0o600;

export type ControlServerOptions = ProtocolConfig & {
  socketPath: string;
  dispatcher: CommandDispatcher;
  log?: Logger;
};

/**
 * Accepts control clients on a Unix-domain socket owned by the current user.
 */
export class ControlServer {
  private readonly log: Logger;
  private readonly connections = new Set<ClientConnection>();
  private server: net.Server | null = null;
  private serverClosed: Promise<void> | null = null;
  private nextConnectionId = 1;

  constructor(private readonly options: ControlServerOptions) {
    this.log = options.log ?? createLogger('Control', 'Server');
  }

  public get socketPath(): string {
    return this.options.socketPath;
  }

  public get connectionCount(): number {
    return this.connections.size;
  }

  public async start(): Promise<void> {
    const socketPath = this.options.socketPath;
    await ensureDir(path.dirname(socketPath));
    await removeStaleSocket(socketPath);

    const server = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (error) => {
      this.log.error('control socket error', { message: error.message });
    });
    this.server = server;
    await fs.chmod(socketPath, SOCKET_MODE);
    this.log.info('control socket listening', {
      socketPath,
      maxConnections: this.options.maxConnections,
      idleTimeoutMs: this.options.idleTimeoutMs,
    });
  }

  /**
   * Stops accepting new clients; connected ones keep being served.
   */
  public stopAccepting(): void {
    const server = this.server;
    if (!server || this.serverClosed) {
      return;
    }
    this.serverClosed = new Promise((resolve) => {
      server.close(() => resolve());
    });
    this.log.info('control socket no longer accepting clients');
  }

  /**
   * Closes every client connection and removes the socket file.
   */
  public async stop(): Promise<void> {
    if (!this.server) {
      return;
    }
    this.stopAccepting();
    await Promise.all([...this.connections].map((connection) => connection.close()));
    await this.serverClosed;
    this.server = null;
    this.serverClosed = null;
    try {
      await fs.unlink(this.options.socketPath);
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
    }
    this.log.info('control socket closed', { socketPath: this.options.socketPath });
  }

  private accept(socket: net.Socket): void {
    const id = this.nextConnectionId++;
    const connection = new ClientConnection({
      id,
      socket,
      dispatcher: this.options.dispatcher,
      maxLineBytes: this.options.maxLineBytes,
      idleTimeoutMs: this.options.idleTimeoutMs,
      log: this.log,
      onClose: (closed) => this.connections.delete(closed),
    });
    if (this.serverClosed) {
      connection.reject({ ok: false, error: { kind: 'internal_error', message: 'daemon shutting down' } });
      return;
    }
    if (this.connections.size >= this.options.maxConnections) {
      this.log.warn('rejecting client: too many connections', { limit: this.options.maxConnections });
      connection.reject({ ok: false, error: { kind: 'internal_error', message: 'too many connections' } });
      return;
    }
    this.connections.add(connection);
    this.log.debug('client connected', { connection: id, clients: this.connections.size });
  }
}

/**
 * Removes a socket file left behind by a previous run. A live listener or a
 * path that is not a socket is an error.
 */
async function removeStaleSocket(socketPath: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.lstat(socketPath);
  } catch (error) {
    if (isMissingFileError(error)) {
      return;
    }
    throw error;
  }
  if (!stats.isSocket()) {
    throw new Error(`refusing to replace non-socket file at ${socketPath}`);
  }
  if (await isListening(socketPath)) {
    throw new Error(`another daemon is already listening on ${socketPath}`);
  }
  await fs.unlink(socketPath);
}

function isListening(socketPath: string): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = net.createConnection(socketPath);
    probe.once('connect', () => {
      probe.destroy();
      resolve(true);
    });
    probe.once('error', () => {
      probe.destroy();
      resolve(false);
    });
  });
}
