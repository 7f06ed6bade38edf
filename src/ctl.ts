import { parseArgs } from 'node:util';
import { COMMAND_NAMES, isCommandName, type Command } from '@/domain/protocol/types';
import { sendCommand, TransportError } from '@/adapters/control/controlClient';
import { defaultSocketPath } from '@/config/defaults';
import { errorMessage } from '@/shared/logging/logger';

export const EXIT_OK = 0;
export const EXIT_COMMAND_FAILED = 1;
export const EXIT_TRANSPORT = 2;

export type CtlIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
};

const USAGE = `usage: cadencectl [--socket <path>] [--token <token>] [--timeout <ms>] <${COMMAND_NAMES.join('|')}> [uri]`;

function parseCtlArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      socket: { type: 'string', short: 's' },
      token: { type: 'string', short: 't' },
      timeout: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

type ParsedArgs = ReturnType<typeof parseCtlArgs>;

function buildCommand(name: string, uri: string | undefined, token: string | undefined): Command | string {
  if (!isCommandName(name)) {
    return `unknown command "${name}"`;
  }
  const base = token ? { token } : {};
  if (name === 'enqueue') {
    if (!uri) {
      return 'enqueue needs a uri';
    }
    return { ...base, cmd: name, uri };
  }
  return { ...base, cmd: name };
}

/**
 * Sends one command to the daemon. Resolves with the process exit code:
 * 0 on success, 1 when the daemon answered with an error, 2 when it could
 * not be reached or the invocation was unusable.
 */
export async function runCtl(argv: string[], io: CtlIo): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCtlArgs(argv);
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n${USAGE}\n`);
    return EXIT_TRANSPORT;
  }
  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  const [name, uri] = positionals;
  const command = name ? buildCommand(name, uri, values.token ?? io.env.CADENCE_TOKEN) : 'missing command';
  if (typeof command === 'string') {
    io.stderr.write(`${command}\n${USAGE}\n`);
    return EXIT_TRANSPORT;
  }
  const timeoutMs = values.timeout === undefined ? undefined : Number(values.timeout);
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
    io.stderr.write(`invalid --timeout "${values.timeout}"\n`);
    return EXIT_TRANSPORT;
  }

  const socketPath = values.socket ?? io.env.CADENCE_SOCKET ?? defaultSocketPath();
  try {
    const response = await sendCommand(socketPath, command, { timeoutMs });
    if (response.ok) {
      io.stdout.write(`${JSON.stringify(response.data)}\n`);
      return EXIT_OK;
    }
    io.stderr.write(`${response.error.kind}: ${response.error.message}\n`);
    return EXIT_COMMAND_FAILED;
  } catch (error) {
    if (error instanceof TransportError) {
      io.stderr.write(`${error.message}\n`);
      return EXIT_TRANSPORT;
    }
    throw error;
  }
}

export function main(): void {
  runCtl(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr, env: process.env })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${errorMessage(error)}\n`);
      process.exitCode = EXIT_TRANSPORT;
    });
}

if (require.main === module) {
  main();
}
