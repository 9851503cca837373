/**
 * Output builders and small helpers for console-driven tests
 */

import pino, { type Logger } from 'pino';
import { sleep } from '@labwright/core';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * `ip -4 addr show` output for one interface plus loopback, loopback first
 */
export function ipAddrOutput(address: string, prefix = 24): string {
  return [
    'ip -4 addr show',
    '1: lo: <LOOPBACK,UP,LOWER_UP> mtu 65536 qdisc noqueue state UNKNOWN',
    '    inet 127.0.0.1/8 scope host lo',
    '2: eth0@if12: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 qdisc noqueue state UP',
    `    inet ${address}/${prefix} brd 10.0.0.255 scope global eth0`,
    '/ # ',
  ].join('\r\n');
}

export function dhclientOutput(address: string): string {
  return [
    'dhclient -v -1',
    'Listening on LPF/eth0/0c:aa:11:22:33:44',
    'DHCPDISCOVER on eth0 to 255.255.255.255 port 67 interval 3',
    `DHCPOFFER of ${address} from 10.0.0.1`,
    `bound to ${address} -- renewal in 1681 seconds.`,
  ].join('\r\n');
}

export function hostnameOutput(...addresses: string[]): string {
  return `hostname -I\r\n${addresses.join(' ')} \r\n/ # `;
}

/**
 * Waits for a condition with timeout
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeoutMs: number = 2000,
  intervalMs: number = 10
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeoutMs) {
    if (await condition()) {
      return;
    }
    await sleep(intervalMs);
  }

  throw new Error(`Timeout waiting for condition after ${timeoutMs}ms`);
}
