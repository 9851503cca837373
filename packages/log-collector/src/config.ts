import { z } from 'zod';

const duration = z.number().int().nonnegative();

export const ZoneRoutingSchema = z.object({
  // Nodes whose name carries this marker go to the matching collector
  routedZone: z.string().min(1).default('OT'),
  // Everything else goes here, then to the first collector
  defaultZone: z.string().min(1).default('IT'),
});

export const LogCollectorOptionsSchema = z.object({
  templateName: z.string().min(1).default('syslog-collector'),
  consoleHost: z.string().nullable().default(null),
  syslogPort: z.number().int().positive().max(65535).default(514),
  logTag: z.string().min(1).default('Student-CMD'),
  logPath: z.string().min(1).default('/var/log/student.log'),
  placement: z
    .object({ offsetX: z.number().default(150), offsetY: z.number().default(100) })
    .default({}),
  adapters: z
    .object({ min: z.number().int().positive().default(1), max: z.number().int().positive().default(15) })
    .default({})
    .refine(range => range.min <= range.max, { message: 'adapters.min must not exceed adapters.max' }),
  routing: ZoneRoutingSchema.default({}),
  timings: z
    .object({
      bootWaitMs: duration.default(3000),
      consoleSettleMs: duration.default(500),
      drainTimeoutMs: duration.default(1000),
      probeReadMs: duration.default(2000),
      dhclientReadMs: duration.default(10000),
      dhcpWaitMs: duration.default(2000),
      syslogStartWaitMs: duration.default(1000),
      logReadMs: duration.default(5000),
    })
    .default({}),
});

export type ZoneRouting = z.infer<typeof ZoneRoutingSchema>;
export type LogCollectorOptions = z.infer<typeof LogCollectorOptionsSchema>;
export type LogCollectorOptionsInput = z.input<typeof LogCollectorOptionsSchema>;
