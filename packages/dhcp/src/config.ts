import { z } from 'zod';

export const DhcpOptionsSchema = z.object({
  startCommand: z.string().min(1).default('/usr/local/bin/start.sh'),
  startReadMs: z.number().int().nonnegative().default(5000),
  dhclientCommand: z.string().min(1).default('dhclient -v -1'),
  dhclientTimeoutMs: z.number().int().nonnegative().default(15000),
  ipShowCommand: z.string().min(1).default('ip -4 addr show'),
  ipShowReadMs: z.number().int().nonnegative().default(1000),
  interCommandDelayMs: z.number().int().nonnegative().default(1000),
  // Pause between the server and client phases
  warmupMs: z.number().int().nonnegative().default(0),
  consoleHost: z.string().nullable().default(null),
});

export type DhcpOptions = z.infer<typeof DhcpOptionsSchema>;
export type DhcpOptionsInput = z.input<typeof DhcpOptionsSchema>;
