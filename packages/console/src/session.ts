import * as net from 'net';
import { StringDecoder } from 'string_decoder';
import pino, { type Logger } from 'pino';
import { v4 as uuid } from 'uuid';
import {
  ConsoleClosedError,
  ConsoleConnectError,
  errorMessage,
  type CommandStatus,
  type ConsoleTarget,
  type IConsoleChannel,
  type ReadForOptions,
  type ReadOptions,
  type StatusCommandOptions,
} from '@labwright/core';
import { ConsoleSettingsSchema, type ConsoleSettings, type ConsoleSettingsInput } from './config';
import { TelnetDecoder } from './telnet-codec';

export type SessionState = 'closed' | 'connecting' | 'open';

const DEFAULT_READ_SIZE = 1024;
const DEFAULT_READ_TIMEOUT_MS = 500;
const DEFAULT_POLL_INTERVAL_MS = 500;
const DEFAULT_COMMAND_WINDOW_MS = 5000;
const TRAILING_DRAIN_MS = 200;

export function createSentinel(): string {
  return `__EXIT_${uuid().replace(/-/g, '').slice(0, 16)}__`;
}

/**
 * Append an exit-status marker so the shell itself reports completion:
 * `<cmd>; printf '<sentinel> %s\n' $?`
 */
export function wrapWithStatus(command: string, sentinel: string): string {
  return `${command}; printf '${sentinel} %s\\n' $?`;
}

/**
 * Split captured console text on the last sentinel. The echoed command line
 * contains the sentinel too, so only the final occurrence carries the status.
 */
export function parseStatusOutput(raw: string, sentinel: string): CommandStatus {
  const index = raw.lastIndexOf(sentinel);
  if (index === -1) {
    return { output: raw, exitCode: null };
  }

  const suffix = raw.slice(index + sentinel.length);
  const statusLine = suffix.split(/\r?\n/)[0].trim();
  const exitCode = /^-?\d+$/.test(statusLine) ? parseInt(statusLine, 10) : null;

  return { output: raw.slice(0, index), exitCode };
}

export interface ConsoleSessionOptions {
  settings?: ConsoleSettingsInput;
  logger?: Logger;
}

/**
 * One telnet connection to one node console.
 *
 * The consoles have no reliable end-of-output marker, so reads are bounded by
 * time: `readFor` listens for a fixed window and returns whatever arrived.
 * A session is not reusable after `close()`; open a new one instead.
 */
export class ConsoleSession implements IConsoleChannel {
  private readonly settings: ConsoleSettings;
  private readonly logger: Logger;
  private socket?: net.Socket;
  private state: SessionState = 'closed';
  private telnet = new TelnetDecoder();
  private text: StringDecoder;
  private buffer = '';
  private waiters = new Set<() => void>();

  constructor(readonly target: ConsoleTarget, options: ConsoleSessionOptions = {}) {
    this.settings = ConsoleSettingsSchema.parse(options.settings ?? {});
    this.logger = options.logger ?? pino({ name: 'console-session' });
    this.text = new StringDecoder(this.settings.encoding);
  }

  get status(): SessionState {
    return this.state;
  }

  async connect(): Promise<void> {
    if (this.state !== 'closed') {
      throw new ConsoleConnectError(this.target.host, this.target.port, `session is already ${this.state}`);
    }

    const { host, port } = this.target;
    this.state = 'connecting';
    this.logger.debug({ host, port }, 'Connecting to console');

    let socket: net.Socket;
    try {
      socket = await this.openSocket();
    } catch (error) {
      this.state = 'closed';
      throw new ConsoleConnectError(host, port, errorMessage(error), { cause: error });
    }

    socket.on('data', (chunk: Buffer) => this.onData(socket, chunk));
    socket.on('error', (error) => {
      this.logger.debug({ host, port, error: error.message }, 'Console socket error');
    });
    socket.on('close', () => {
      this.logger.debug({ host, port }, 'Console socket closed by peer');
    });

    this.socket = socket;
    this.telnet = new TelnetDecoder();
    this.text = new StringDecoder(this.settings.encoding);
    this.buffer = '';
    this.state = 'open';
  }

  async send(text: string, options: { newline?: boolean } = {}): Promise<void> {
    const socket = this.requireSocket();
    const payload = text + (options.newline === false ? '' : this.settings.newline);
    await this.write(socket, payload);
  }

  /** Best-effort single read. Resolves to '' when nothing arrives in time. */
  async read(options: ReadOptions = {}): Promise<string> {
    this.requireSocket();
    const size = options.size ?? DEFAULT_READ_SIZE;
    const timeoutMs = options.timeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

    if (!this.buffer) {
      await this.waitForData(timeoutMs);
    }

    const chunk = this.buffer.slice(0, size);
    this.buffer = this.buffer.slice(chunk.length);
    return chunk;
  }

  async readFor(durationMs: number, options: ReadForOptions = {}): Promise<string> {
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + durationMs;
    const chunks: string[] = [];

    while (Date.now() < deadline) {
      const remaining = Math.max(deadline - Date.now(), 0);
      const chunk = await this.read({
        size: options.size,
        timeoutMs: Math.min(pollIntervalMs, remaining),
      });
      if (chunk) chunks.push(chunk);
    }

    return chunks.join('');
  }

  async runCommand(command: string, readDurationMs = DEFAULT_COMMAND_WINDOW_MS): Promise<string> {
    await this.send(command);
    return this.readFor(readDurationMs);
  }

  async runCommandWithStatus(command: string, options: StatusCommandOptions = {}): Promise<CommandStatus> {
    const sentinel = options.sentinel ?? createSentinel();
    await this.send(wrapWithStatus(command, sentinel));

    const raw = await this.readFor(options.readDurationMs ?? DEFAULT_COMMAND_WINDOW_MS);
    const status = parseStatusOutput(raw, sentinel);

    // prompt noise after the marker
    await this.readFor(TRAILING_DRAIN_MS);
    return status;
  }

  /**
   * Sends the exit command to free the console slot, then drops the socket.
   * Runs on cleanup paths, so every failure is logged and discarded.
   */
  async close(exitCommand: string | null = this.settings.exitCommand): Promise<void> {
    const socket = this.socket;
    this.socket = undefined;
    this.state = 'closed';
    this.buffer = '';
    this.wakeReaders();

    if (!socket) return;

    if (exitCommand && !socket.destroyed) {
      try {
        await this.write(socket, exitCommand + this.settings.newline);
      } catch (error) {
        this.logger.debug({ target: this.target, error: errorMessage(error) }, 'Exit command not delivered');
      }
    }

    try {
      socket.end();
      socket.destroy();
    } catch (error) {
      this.logger.debug({ target: this.target, error: errorMessage(error) }, 'Console socket close failed');
    }
  }

  private openSocket(): Promise<net.Socket> {
    const { host, port } = this.target;
    const timeoutMs = this.settings.connectTimeoutMs;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onError = (error: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(error);
      };

      const timer = setTimeout(() => {
        socket.off('error', onError);
        socket.destroy();
        reject(new Error(`connect timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }

  private onData(socket: net.Socket, chunk: Buffer): void {
    if (socket !== this.socket) return;

    const { data, replies } = this.telnet.push(chunk);
    if (replies.length > 0) {
      socket.write(replies);
    }

    const text = this.text.write(data);
    if (text) {
      this.buffer += text;
      this.wakeReaders();
    }
  }

  private waitForData(timeoutMs: number): Promise<void> {
    if (timeoutMs <= 0) return Promise.resolve();

    return new Promise(resolve => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.waiters.add(done);
    });
  }

  private wakeReaders(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }

  private write(socket: net.Socket, payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.write(payload, this.settings.encoding, error => (error ? reject(error) : resolve()));
    });
  }

  private requireSocket(): net.Socket {
    if (this.state !== 'open' || !this.socket) {
      throw new ConsoleClosedError();
    }
    return this.socket;
  }
}
