const INET_PATTERN = /\binet\s+(\d+\.\d+\.\d+\.\d+)\/(\d+)/g;
const IPV4_LITERAL = /\b(?:(?:25[0-5]|2[0-4]\d|[01]?\d\d?)\.){3}(?:25[0-5]|2[0-4]\d|[01]?\d\d?)\b/g;

/**
 * First `inet a.b.c.d/prefix` address in `ip addr` output, skipping loopback.
 */
export function extractFirstIpv4(output: string | null | undefined): string | null {
  if (!output) return null;
  for (const match of output.matchAll(INET_PATTERN)) {
    const address = match[1];
    if (!address.startsWith('127.')) {
      return address;
    }
  }
  return null;
}

/**
 * First address in `hostname -I` style output that is neither loopback nor
 * link-local.
 */
export function firstUsableAddress(output: string | null | undefined): string | null {
  if (!output) return null;
  const matches = output.trim().match(IPV4_LITERAL) ?? [];
  return matches.find(ip => !ip.startsWith('127.') && !ip.startsWith('169.254.')) ?? null;
}
