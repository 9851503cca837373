import * as net from 'net';

const IAC = 0xff;
const SB = 0xfa;
const SE = 0xf0;

export interface ConsoleServerOptions {
  /** Raw bytes written as soon as a client connects, negotiation included. */
  banner?: Buffer | string;
}

export interface ConsoleServer {
  readonly port: number;
  readonly host: string;
  /** Command lines received, CR framing removed. */
  readonly lines: string[];
  /** Every byte received, negotiation replies included. */
  readonly received: Buffer[];
  close(): Promise<void>;
}

/**
 * What the server does with one received line: return text to write back,
 * or nothing to stay silent.
 */
export type LineHandler = (line: string, socket: net.Socket) => string | Buffer | void;

function stripNegotiation(chunk: Buffer): Buffer {
  const out: number[] = [];
  for (let i = 0; i < chunk.length; i++) {
    const byte = chunk[i];
    if (byte !== IAC) {
      out.push(byte);
      continue;
    }
    const verb = chunk[i + 1];
    if (verb === SB) {
      const end = chunk.indexOf(SE, i + 2);
      i = end === -1 ? chunk.length : end;
    } else if (verb === IAC) {
      out.push(IAC);
      i += 1;
    } else {
      i += 2;
    }
  }
  return Buffer.from(out);
}

/** A line-based console on 127.0.0.1 with an ephemeral port. */
export function startConsoleServer(onLine: LineHandler, options: ConsoleServerOptions = {}): Promise<ConsoleServer> {
  const sockets = new Set<net.Socket>();
  const lines: string[] = [];
  const received: Buffer[] = [];

  const server = net.createServer(socket => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => sockets.delete(socket));

    if (options.banner) socket.write(options.banner);

    let pending = '';
    socket.on('data', (chunk: Buffer) => {
      received.push(chunk);
      pending += stripNegotiation(chunk).toString('latin1');

      let index = pending.indexOf('\r');
      while (index !== -1) {
        const line = pending.slice(0, index).replace(/^\n/, '');
        pending = pending.slice(index + 1);
        lines.push(line);

        const reply = onLine(line, socket);
        if (reply !== undefined && !socket.destroyed) socket.write(reply);
        index = pending.indexOf('\r');
      }
    });
  });

  const state = {
    port: 0,
    host: '127.0.0.1',
    lines,
    received,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const socket of sockets) socket.destroy();
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('console server has no TCP address'));
        return;
      }
      state.port = address.port;
      resolve(state);
    });
  });
}
