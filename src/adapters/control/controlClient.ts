import net from 'node:net';
import type { Command } from '@/domain/protocol/types';
import { decodeResponse, encodeCommand, type DecodedResponse } from '@/adapters/control/protocol/codec';
import { LineFramer } from '@/shared/lineFramer';
import { errorMessage } from '@/shared/logging/logger';

const DEFAULT_TIMEOUT_MS = 10000;
const MAX_RESPONSE_BYTES = 1024 * 1024;

/** The daemon could not be reached or answered with something unreadable. */
export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export type SendCommandOptions = {
  timeoutMs?: number;
};

/**
 * Sends one command over a fresh connection and resolves with the daemon's reply.
 */
export function sendCommand(
  socketPath: string,
  command: Command,
  options: SendCommandOptions = {},
): Promise<DecodedResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(socketPath);
    const framer = new LineFramer(MAX_RESPONSE_BYTES);
    let settled = false;

    const finish = (outcome: { response: DecodedResponse } | { error: TransportError }): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      if ('error' in outcome) {
        reject(outcome.error);
      } else {
        resolve(outcome.response);
      }
    };

    socket.setTimeout(timeoutMs, () => {
      finish({ error: new TransportError(`no response within ${timeoutMs}ms`) });
    });
    socket.once('connect', () => {
      socket.write(encodeCommand(command));
    });
    socket.on('data', (chunk: Buffer) => {
      for (const frame of framer.push(chunk)) {
        if (frame.kind === 'overflow') {
          finish({ error: new TransportError('response too large') });
          return;
        }
        if (!frame.line.trim()) continue;
        try {
          finish({ response: decodeResponse(frame.line, { maxLineBytes: MAX_RESPONSE_BYTES }) });
        } catch (error) {
          finish({ error: new TransportError(`unreadable response: ${errorMessage(error)}`) });
        }
        return;
      }
    });
    socket.on('error', (error) => {
      finish({ error: new TransportError(`cannot reach daemon at ${socketPath}: ${error.message}`) });
    });
    socket.on('close', () => {
      finish({ error: new TransportError('connection closed before a response arrived') });
    });
  });
}
