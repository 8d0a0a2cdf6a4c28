import { ConsoleLogger, RequestCancelledError, parseLogLevel } from '@courtsync/resilient-fetch';
import { createCourtListenerClient } from '@courtsync/courtlistener-client';
import type { CourtListenerClientConfig } from '@courtsync/courtlistener-client';
import { USAGE, parseCliArgs } from './cli';
import type { CliCommand } from './cli';
import { CliUsageError, errorMessage } from './errors';
import { runOpinionSync } from './sync';
import type { OpinionSource } from './sync';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface RunCliDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  signal?: AbortSignal;
  /** Builds the opinion source; defaults to a client configured from `env`. */
  createSource?: (overrides: Partial<CourtListenerClientConfig>, env: NodeJS.ProcessEnv) => OpinionSource;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Parse arguments, run one sync and map the outcome to an exit code.
 */
export async function runCli(argv: readonly string[], deps: RunCliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const io = deps.io ?? consoleIo;

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.err(`error: ${error.message}`);
      io.err(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (command.kind === 'help') {
    io.out(USAGE);
    return EXIT_OK;
  }

  const { options } = command;
  const logger = new ConsoleLogger(parseLogLevel(env.COURTSYNC_LOG_LEVEL));
  const overrides: Partial<CourtListenerClientConfig> = { logger, signal: deps.signal };
  if (options.token) {
    overrides.token = options.token;
  }
  if (options.userAgent) {
    overrides.userAgent = options.userAgent;
  }
  const createSource = deps.createSource ?? createCourtListenerClient;

  try {
    await runOpinionSync(createSource(overrides, env), options, { logger, print: io.out });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof RequestCancelledError) {
      io.err('Cancelled.');
    } else {
      io.err(`Sync failed: ${errorMessage(error)}`);
    }
    return EXIT_FAILURE;
  }
}
