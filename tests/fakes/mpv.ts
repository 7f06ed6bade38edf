import net from 'node:net';
import type { MpvHandle, MpvLauncher, MpvLaunchOptions } from '../../src/adapters/playback/mpv/mpvProcess';
import { LineFramer } from '../../src/shared/lineFramer';
import { isRecord } from '../../src/shared/utils/isRecord';

export type FakeMpvReply = { error?: string; data?: unknown } | 'hang';

/**
 * Speaks enough of mpv's JSON IPC to drive the local adapter: loadfile,
 * stop, quit, get_property and set_property against an in-memory property bag.
 */
export class FakeMpvServer {
  public readonly received: unknown[][] = [];
  public readonly properties = new Map<string, unknown>([
    ['idle-active', true],
    ['pause', false],
  ]);
  private readonly overrides = new Map<string, FakeMpvReply[]>();
  private readonly sockets = new Set<net.Socket>();

  private constructor(
    private readonly server: net.Server,
    public readonly ipcPath: string,
  ) {}

  public static async start(ipcPath: string): Promise<FakeMpvServer> {
    const server = net.createServer();
    const fake = new FakeMpvServer(server, ipcPath);
    server.on('connection', (socket) => fake.accept(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(ipcPath, () => resolve());
    });
    return fake;
  }

  public get connections(): number {
    return this.sockets.size;
  }

  public replyNext(command: string, reply: FakeMpvReply): void {
    const queued = this.overrides.get(command) ?? [];
    queued.push(reply);
    this.overrides.set(command, queued);
  }

  public commandNames(): string[] {
    return this.received.map((command) => String(command[0]));
  }

  public emit(event: Record<string, unknown>): void {
    for (const socket of this.sockets) {
      socket.write(`${JSON.stringify(event)}\n`);
    }
  }

  public async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  private accept(socket: net.Socket): void {
    const framer = new LineFramer(64 * 1024);
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => socket.destroy());
    socket.on('data', (chunk: Buffer) => {
      for (const frame of framer.push(chunk)) {
        if (frame.kind === 'line' && frame.line) {
          this.handle(socket, frame.line);
        }
      }
    });
  }

  private handle(socket: net.Socket, line: string): void {
    const message: unknown = JSON.parse(line);
    if (!isRecord(message) || !Array.isArray(message.command)) {
      return;
    }
    const command: unknown[] = message.command;
    const requestId = message.request_id;
    this.received.push(command);
    const name = String(command[0]);
    const override = this.overrides.get(name)?.shift();
    if (override === 'hang') {
      return;
    }
    const reply = override ?? this.execute(command);
    socket.write(`${JSON.stringify({ request_id: requestId, error: reply.error ?? 'success', data: reply.data })}\n`);
  }

  private execute(command: unknown[]): { error?: string; data?: unknown } {
    const [name, arg, value] = command;
    switch (name) {
      case 'loadfile':
        this.properties.set('idle-active', false);
        this.properties.set('time-pos', 3.14159);
        return {};
      case 'stop':
        this.properties.set('idle-active', true);
        this.properties.delete('time-pos');
        return {};
      case 'quit':
        return {};
      case 'set_property':
        this.properties.set(String(arg), value);
        return {};
      case 'get_property': {
        const key = String(arg);
        return this.properties.has(key) ? { data: this.properties.get(key) } : { error: 'property unavailable' };
      }
      default:
        return { error: 'invalid parameter' };
    }
  }
}

export class FakeMpvHandle implements MpvHandle {
  public exited = false;
  public terminated = 0;
  public readonly pid = 4242;
  private readonly listeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];

  constructor(public readonly ipcPath: string) {}

  public onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.listeners.push(listener);
  }

  public async terminate(): Promise<void> {
    this.terminated += 1;
    this.exit(null, 'SIGTERM');
  }

  /** Simulates the process going away. */
  public exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = true;
    for (const listener of this.listeners) {
      listener(code, signal);
    }
  }
}

export type FakeLauncher = {
  launcher: MpvLauncher;
  handles: FakeMpvHandle[];
  launches: MpvLaunchOptions[];
};

export function createFakeLauncher(ipcPath: string): FakeLauncher {
  const handles: FakeMpvHandle[] = [];
  const launches: MpvLaunchOptions[] = [];
  const launcher: MpvLauncher = async (options) => {
    launches.push(options);
    const handle = new FakeMpvHandle(ipcPath);
    handles.push(handle);
    return handle;
  };
  return { launcher, handles, launches };
}
