import { ERROR_KINDS, ProtocolError, type ErrorKind } from '@/domain/errors';
import {
  isCommandName,
  type Command,
  type ErrorResponse,
  type Response,
} from '@/domain/protocol/types';

export const DEFAULT_MAX_LINE_BYTES = 64 * 1024;

export type CodecOptions = {
  maxLineBytes?: number;
};

/**
 * What a client gets back from `decodeResponse`: the data payload is only
 * checked to be an object, its fields depend on the command that was sent.
 */
export type DecodedResponse =
  | { ok: true; data: Record<string, unknown> }
  | ErrorResponse;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some((known) => known === value);
}

function parseJsonLine(line: string, maxLineBytes: number): unknown {
  if (Buffer.byteLength(line, 'utf8') > maxLineBytes) {
    throw new ProtocolError(`line exceeds ${maxLineBytes} bytes`);
  }
  try {
    return JSON.parse(line);
  } catch {
    throw new ProtocolError('malformed JSON');
  }
}

/**
 * Decodes one request line (without its newline) into a command.
 */
export function decodeCommand(line: string, options: CodecOptions = {}): Command {
  const payload = parseJsonLine(line, options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES);
  if (!isJsonObject(payload)) {
    throw new ProtocolError('request must be a JSON object');
  }

  const { cmd, args, token } = payload;
  if (cmd === undefined) {
    throw new ProtocolError('missing "cmd" field');
  }
  if (!isCommandName(cmd)) {
    throw new ProtocolError(`unknown command ${JSON.stringify(cmd)}`);
  }
  if (args !== undefined && !isJsonObject(args)) {
    throw new ProtocolError('"args" must be an object');
  }
  if (token !== undefined && typeof token !== 'string') {
    throw new ProtocolError('"token" must be a string');
  }
  const base = token === undefined ? {} : { token };

  switch (cmd) {
    case 'enqueue': {
      const uri = args?.uri;
      if (typeof uri !== 'string' || !uri.trim()) {
        throw new ProtocolError('enqueue requires a non-empty "uri" argument');
      }
      return { ...base, cmd, uri };
    }
    case 'play':
    case 'pause':
    case 'status':
    case 'next':
    case 'list':
    case 'stop':
    case 'hello':
      return { ...base, cmd };
  }
}

/**
 * Serializes a command as a request line, newline included.
 */
export function encodeCommand(command: Command): string {
  const args = command.cmd === 'enqueue' ? { uri: command.uri } : {};
  const payload: JsonObject = { cmd: command.cmd, args };
  if (command.token !== undefined) {
    payload.token = command.token;
  }
  return `${JSON.stringify(payload)}\n`;
}

/**
 * Serializes a response envelope as a line, newline included.
 */
export function encodeResponse(response: Response): string {
  return `${JSON.stringify(response)}\n`;
}

export function decodeResponse(line: string, options: CodecOptions = {}): DecodedResponse {
  const payload = parseJsonLine(line, options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES);
  if (!isJsonObject(payload) || typeof payload.ok !== 'boolean') {
    throw new ProtocolError('response must be an object with a boolean "ok"');
  }
  if (payload.ok) {
    const data = payload.data ?? {};
    if (!isJsonObject(data)) {
      throw new ProtocolError('response "data" must be an object');
    }
    return { ok: true, data };
  }
  const error = payload.error;
  if (!isJsonObject(error) || !isErrorKind(error.kind) || typeof error.message !== 'string') {
    throw new ProtocolError('response "error" must carry a known kind and a message');
  }
  return { ok: false, error: { kind: error.kind, message: error.message } };
}
