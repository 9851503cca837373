import {
  CommandFailedError,
  sleep,
  type CommandStatus,
  type ConsoleConnector,
  type ConsoleTarget,
  type IConsoleChannel,
  type StatusCommandOptions,
} from '@labwright/core';
import { ConsoleSession, type ConsoleSessionOptions } from './session';

export type CommandStep = readonly [command: string, readDurationMs: number];

export function createConnector(options: ConsoleSessionOptions = {}): ConsoleConnector {
  return async (target) => {
    const session = new ConsoleSession(target, options);
    await session.connect();
    return session;
  };
}

/**
 * Scoped console acquisition: the session is closed on every exit path,
 * including errors thrown by `fn`.
 */
export async function withConsole<T>(
  connect: ConsoleConnector,
  target: ConsoleTarget,
  fn: (session: IConsoleChannel) => Promise<T>
): Promise<T> {
  const session = await connect(target);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

export function runCommand(
  connect: ConsoleConnector,
  target: ConsoleTarget,
  command: string,
  readDurationMs = 5000
): Promise<string> {
  return withConsole(connect, target, session => session.runCommand(command, readDurationMs));
}

/** Runs each step in one session and returns the outputs concatenated. */
export function runCommandSequence(
  connect: ConsoleConnector,
  target: ConsoleTarget,
  steps: readonly CommandStep[],
  options: { interCommandDelayMs?: number } = {}
): Promise<string> {
  const delay = options.interCommandDelayMs ?? 0;

  return withConsole(connect, target, async (session) => {
    const outputs: string[] = [];
    for (const [command, readDurationMs] of steps) {
      outputs.push(await session.runCommand(command, readDurationMs));
      await sleep(delay);
    }
    return outputs.join('');
  });
}

/**
 * For call sites that need the command to succeed: a non-zero or unreported
 * exit status throws `CommandFailedError`.
 */
export async function runCheckedCommand(
  connect: ConsoleConnector,
  target: ConsoleTarget,
  command: string,
  options: StatusCommandOptions = {}
): Promise<CommandStatus> {
  const status = await withConsole(connect, target, session => session.runCommandWithStatus(command, options));
  if (status.exitCode !== 0) {
    throw new CommandFailedError(command, status.exitCode, status.output);
  }
  return status;
}
