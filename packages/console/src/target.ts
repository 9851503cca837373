import type { ConsoleTarget } from '@labwright/core';

export const LOOPBACK_FALLBACK = '127.0.0.1';

// "Listens on all interfaces" placeholders reported by the platform
const UNUSABLE_HOSTS = new Set(['', '0.0.0.0', '::']);

export interface ConsoleEndpoint {
  consolePort?: unknown;
  consoleHost?: unknown;
}

function parseUrlHost(raw: string): string | null {
  try {
    return new URL(raw).hostname;
  } catch {
    return null;
  }
}

/**
 * Reduce a host setting to a dialable host name. Accepts bare hosts,
 * `host:port`, bracketed IPv6 and URL forms (scheme and user-info dropped).
 */
export function normalizeHost(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const raw = String(value).trim();
  if (!raw) return null;

  let candidate = raw.includes('://') ? parseUrlHost(raw) : null;

  if (!candidate) {
    let rest = raw.includes('//') ? raw.slice(raw.indexOf('//') + 2) : raw;
    rest = rest.split('/')[0];
    rest = rest.slice(rest.lastIndexOf('@') + 1);

    if (rest.startsWith('[') && rest.includes(']')) {
      candidate = rest.slice(1, rest.indexOf(']'));
    } else if ((rest.match(/:/g) ?? []).length > 1) {
      // bare IPv6 literal
      candidate = rest;
    } else {
      candidate = rest.split(':')[0];
    }
  }

  candidate = candidate.trim();
  if (candidate.startsWith('[') && candidate.endsWith(']')) {
    candidate = candidate.slice(1, -1);
  }

  return UNUSABLE_HOSTS.has(candidate) ? null : candidate;
}

function toPort(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 && value <= 65535 ? value : null;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    const port = parseInt(value, 10);
    return port > 0 && port <= 65535 ? port : null;
  }
  return null;
}

/**
 * Host priority: override, the node's own console host, loopback.
 * Returns null instead of throwing when nothing usable is configured.
 */
export function resolveConsoleTarget(
  node: ConsoleEndpoint,
  overrideHost?: string | null
): ConsoleTarget | null {
  const port = toPort(node.consolePort);
  if (port === null) return null;

  for (const candidate of [overrideHost, node.consoleHost, LOOPBACK_FALLBACK]) {
    const host = normalizeHost(candidate);
    if (host) {
      return { host, port };
    }
  }

  return null;
}
