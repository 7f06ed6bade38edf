import { AuthError, isDaemonError } from '@/domain/errors';
import type { SessionSnapshot } from '@/domain/playback/types';
import {
  COMMAND_NAMES,
  PROTOCOL_VERSION,
  type Command,
  type ErrorResponse,
  type HelloData,
  type Response,
  type ResponseData,
  type StateData,
  type StatusData,
  type TransportData,
} from '@/domain/protocol/types';
import type { PlaybackSession, TransportResult } from '@/application/session/PlaybackSession';
import type { AuthPolicy, AuthState } from '@/application/dispatch/authPolicy';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

export type ServerInfo = {
  name: string;
  version: string;
};

export type CommandDispatcherOptions = {
  session: PlaybackSession;
  auth: AuthPolicy;
  server: ServerInfo;
  log?: Logger;
};

export type DispatchOutcome = {
  response: Response;
  /** The connection must be closed once the response is written. */
  close: boolean;
};

function transportData(result: TransportResult): TransportData {
  const data: TransportData = { state: result.state };
  if (result.track) {
    data.track = result.track.locator;
  }
  return data;
}

function stateData(result: TransportResult): StateData {
  return { state: result.state };
}

function statusData(snapshot: SessionSnapshot): StatusData {
  const data: StatusData = { state: snapshot.state, queue_len: snapshot.queueLength };
  if (snapshot.track) {
    data.track = snapshot.track.locator;
    if (snapshot.track.title !== undefined) data.title = snapshot.track.title;
    if (snapshot.track.duration !== undefined) data.duration = snapshot.track.duration;
  }
  if (snapshot.position !== undefined) {
    data.position = snapshot.position;
  }
  if (snapshot.lastError !== undefined) {
    data.error = snapshot.lastError;
  }
  return data;
}

/**
 * Maps decoded commands onto the session and every outcome onto a response
 * envelope. Nothing thrown below this point escapes to the connection.
 */
export class CommandDispatcher {
  private readonly log: Logger;

  constructor(private readonly options: CommandDispatcherOptions) {
    this.log = options.log ?? createLogger('Control', 'Dispatcher');
  }

  public async dispatch(command: Command, connection: AuthState): Promise<DispatchOutcome> {
    try {
      this.options.auth.authorize(connection, command.token);
      const data = await this.execute(command);
      return { response: { ok: true, data }, close: false };
    } catch (error) {
      return { response: this.errorResponse(error, command.cmd), close: error instanceof AuthError };
    }
  }

  /**
   * Envelope for a failure raised anywhere in the request path.
   */
  public errorResponse(error: unknown, command?: string): ErrorResponse {
    if (isDaemonError(error)) {
      this.log.debug('command rejected', { command, kind: error.kind, message: error.message });
      return { ok: false, error: { kind: error.kind, message: error.message } };
    }
    this.log.error('unexpected failure while handling command', {
      command,
      message: errorMessage(error),
    });
    return { ok: false, error: { kind: 'internal_error', message: 'internal error' } };
  }

  private async execute(command: Command): Promise<ResponseData> {
    const session = this.options.session;
    switch (command.cmd) {
      case 'play':
        return transportData(await session.play());
      case 'pause':
        return stateData(await session.pause());
      case 'next':
        return transportData(await session.next());
      case 'stop':
        return stateData(await session.stop());
      case 'status':
        return statusData(await session.status());
      case 'enqueue':
        return { queue_len: await session.enqueue(command.uri) };
      case 'list':
        return { tracks: await session.list() };
      case 'hello':
        return this.hello();
    }
  }

  private hello(): HelloData {
    return {
      name: this.options.server.name,
      version: this.options.server.version,
      protocol: PROTOCOL_VERSION,
      commands: [...COMMAND_NAMES],
    };
  }
}
