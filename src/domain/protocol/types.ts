import type { ErrorKind } from '@/domain/errors';
import type { PlaybackState } from '@/domain/playback/types';

export const PROTOCOL_VERSION = 1;

export const COMMAND_NAMES = [
  'play',
  'pause',
  'status',
  'enqueue',
  'next',
  'list',
  'stop',
  'hello',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

type CommandBase = {
  token?: string;
};

export type Command =
  | (CommandBase & { cmd: 'play' })
  | (CommandBase & { cmd: 'pause' })
  | (CommandBase & { cmd: 'status' })
  | (CommandBase & { cmd: 'enqueue'; uri: string })
  | (CommandBase & { cmd: 'next' })
  | (CommandBase & { cmd: 'list' })
  | (CommandBase & { cmd: 'stop' })
  | (CommandBase & { cmd: 'hello' });

export type TransportData = {
  state: PlaybackState;
  track?: string;
};

export type StateData = { state: PlaybackState };

export type StatusData = {
  state: PlaybackState;
  track?: string;
  position?: number;
  queue_len: number;
  title?: string;
  duration?: number;
  error?: string;
};

export type EnqueueData = { queue_len: number };

export type ListData = { tracks: string[] };

export type HelloData = {
  name: string;
  version: string;
  protocol: number;
  commands: CommandName[];
};

/**
 * Success payload per command; keeps the dispatcher's switch exhaustive.
 */
export type CommandDataMap = {
  play: TransportData;
  pause: StateData;
  status: StatusData;
  enqueue: EnqueueData;
  next: TransportData;
  list: ListData;
  stop: StateData;
  hello: HelloData;
};

export type ResponseData = CommandDataMap[CommandName];

export type ErrorBody = {
  kind: ErrorKind;
  message: string;
};

export type SuccessResponse<T extends ResponseData = ResponseData> = { ok: true; data: T };

export type ErrorResponse = { ok: false; error: ErrorBody };

export type Response<T extends ResponseData = ResponseData> = SuccessResponse<T> | ErrorResponse;

export function isCommandName(value: unknown): value is CommandName {
  return COMMAND_NAMES.some((known) => known === value);
}
