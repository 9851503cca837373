export const HOSTNAME_COMMAND = 'hostname -I';
export const DHCLIENT_COMMAND = 'dhclient -v -1';
export const SYSLOG_PROBE_COMMAND = 'pgrep syslog-ng';
export const SYSLOG_START_COMMAND = 'syslog-ng';

const NOISE_PREFIXES = ['cat ', '#', '/ #'];

/** POSIX single-quote quoting. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Shell hook that forwards each history entry to the collector over syslog.
 */
export function buildPromptCommand(collectorIp: string, port: number, tag: string): string {
  return `export PROMPT_COMMAND='history -a >(tee -a ~/.bash_history | logger -n ${collectorIp} -P ${port} -t "${tag}")'`;
}

export function persistToBashrc(line: string): string {
  return `printf '%s\\n' ${shellQuote(line)} >> ~/.bashrc`;
}

export function readLogCommand(logPath: string): string {
  return `cat ${logPath}`;
}

/** True when pgrep printed at least one PID line. */
export function hasPid(output: string): boolean {
  return /^\s*\d+\s*$/m.test(output);
}

/** Drops the echoed command and prompt lines from captured log output. */
export function cleanLogOutput(output: string): string {
  return output
    .split(/\r?\n/)
    .filter(line => {
      const trimmed = line.trim();
      return !NOISE_PREFIXES.some(prefix => trimmed.startsWith(prefix));
    })
    .join('\n')
    .trim();
}
