import { z } from 'zod';

export const ConsoleSettingsSchema = z.object({
  encoding: z.enum(['utf8', 'latin1', 'ascii']).default('utf8'),
  // Emulated consoles expect CR framing
  newline: z.string().default('\r'),
  connectTimeoutMs: z.number().int().min(100).default(10000),
  exitCommand: z.string().nullable().default('exit'),
});

export type ConsoleSettings = z.infer<typeof ConsoleSettingsSchema>;
export type ConsoleSettingsInput = z.input<typeof ConsoleSettingsSchema>;
