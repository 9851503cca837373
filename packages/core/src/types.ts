import { z } from 'zod';

export const NodeKind = z.enum(['switch', 'server', 'firewall', 'collector', 'plain']);
export type NodeKind = z.infer<typeof NodeKind>;

export const ConsoleTarget = z.object({
  host: z.string().min(1),
  port: z.number().int().positive(),
});
export type ConsoleTarget = z.infer<typeof ConsoleTarget>;

// Record shape kept in the generated config. Unknown keys survive a rewrite.
export const NodeRecord = z.object({
  name: z.string(),
  nodeId: z.string().optional(),
  consolePort: z.union([z.number(), z.string()]).nullable().optional(),
  consoleHost: z.string().nullable().optional(),
  consoleType: z.string().nullable().optional(),
  assignedIp: z.string().nullable().optional(),
  status: z.string().optional(),
}).passthrough();
export type NodeRecord = z.infer<typeof NodeRecord>;

export const ConfigDocument = z.object({
  projectName: z.string().optional(),
  projectId: z.string().optional(),
  nodes: z.array(z.unknown()),
}).passthrough();
export type ConfigDocument = z.infer<typeof ConfigDocument>;

export const NodeAction = z.enum(['start-server', 'dhclient']);
export type NodeAction = z.infer<typeof NodeAction>;

export const NodeExecutionResult = z.object({
  name: z.string(),
  host: z.string(),
  port: z.number(),
  action: NodeAction,
  success: z.boolean(),
  output: z.string().nullable(),
  error: z.string().nullable(),
  assignedIp: z.string().nullable(),
});
export type NodeExecutionResult = Readonly<z.infer<typeof NodeExecutionResult>>;

export const CommandStatus = z.object({
  output: z.string(),
  exitCode: z.number().int().nullable(),
});
export type CommandStatus = z.infer<typeof CommandStatus>;

export const CollectorConfig = z.object({
  nameSuffix: z.string().min(1),
  switchName: z.string().min(1),
});
export type CollectorConfig = z.infer<typeof CollectorConfig>;

export const SnitchNodeInfo = z.object({
  nodeId: z.string(),
  name: z.string(),
  ipAddress: z.string(),
  port: z.number().int().positive().default(514),
  connectedToSwitch: z.string(),
  consolePort: z.number().int().positive().nullable(),
  consoleHost: z.string().nullable(),
});
export type SnitchNodeInfo = z.infer<typeof SnitchNodeInfo>;

// Platform-side shapes, already mapped from the REST payloads
export const PlatformNode = z.object({
  nodeId: z.string(),
  name: z.string(),
  consolePort: z.number().int().nullable(),
  consoleHost: z.string().nullable(),
  consoleType: z.string().nullable(),
  status: z.string().optional(),
  x: z.number().default(0),
  y: z.number().default(0),
});
export type PlatformNode = z.infer<typeof PlatformNode>;

export const LinkEndpoint = z.object({
  nodeId: z.string(),
  adapterNumber: z.number().int().nonnegative(),
  portNumber: z.number().int().nonnegative(),
});
export type LinkEndpoint = z.infer<typeof LinkEndpoint>;

export const PlatformLink = z.object({
  linkId: z.string(),
  nodes: z.array(z.object({
    nodeId: z.string(),
    adapterNumber: z.number().int().optional(),
    portNumber: z.number().int().optional(),
  })),
});
export type PlatformLink = z.infer<typeof PlatformLink>;

export const PlatformTemplate = z.object({
  templateId: z.string(),
  name: z.string(),
});
export type PlatformTemplate = z.infer<typeof PlatformTemplate>;

export const PlatformProject = z.object({
  projectId: z.string(),
  name: z.string(),
  status: z.string().optional(),
});
export type PlatformProject = z.infer<typeof PlatformProject>;
