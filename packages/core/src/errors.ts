export type LabwrightErrorCode =
  | 'CONSOLE_CONNECT'
  | 'CONSOLE_CLOSED'
  | 'COMMAND_FAILED'
  | 'PORT_ALLOCATION'
  | 'LOOKUP'
  | 'CONFIG_FORMAT'
  | 'PLATFORM_API';

export class LabwrightError extends Error {
  readonly code: LabwrightErrorCode;

  constructor(code: LabwrightErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConsoleConnectError extends LabwrightError {
  constructor(
    readonly host: string,
    readonly port: number,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('CONSOLE_CONNECT', `Console ${host}:${port} unreachable: ${reason}`, options);
  }
}

export class ConsoleClosedError extends LabwrightError {
  constructor() {
    super('CONSOLE_CLOSED', 'Console session is not open');
  }
}

export class CommandFailedError extends LabwrightError {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly output: string
  ) {
    super(
      'COMMAND_FAILED',
      exitCode === null
        ? `Command did not report an exit status: ${command}`
        : `Command exited with status ${exitCode}: ${command}`
    );
  }
}

export class PortAllocationError extends LabwrightError {
  constructor(switchName: string, min: number, max: number) {
    super('PORT_ALLOCATION', `No available ports on node '${switchName}' (adapters ${min}-${max} all in use)`);
  }
}

export class LookupError extends LabwrightError {
  constructor(message: string) {
    super('LOOKUP', message);
  }
}

export class ConfigFormatError extends LabwrightError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_FORMAT', message, options);
  }
}

export class PlatformApiError extends LabwrightError {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number | null,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super('PLATFORM_API', `${method} ${path} failed${status !== null ? ` (${status})` : ''}: ${detail}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
