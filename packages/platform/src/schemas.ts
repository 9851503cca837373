import { z } from 'zod';
import type { PlatformLink, PlatformNode, PlatformProject, PlatformTemplate } from '@labwright/core';

// Wire payloads as the platform returns them (snake_case), mapped to core shapes

export const RawNodeSchema = z
  .object({
    node_id: z.string(),
    name: z.string(),
    console: z.number().int().nullable().optional(),
    console_host: z.string().nullable().optional(),
    console_type: z.string().nullable().optional(),
    status: z.string().optional(),
    x: z.number().optional(),
    y: z.number().optional(),
  })
  .transform((raw): PlatformNode => ({
    nodeId: raw.node_id,
    name: raw.name,
    consolePort: raw.console ?? null,
    consoleHost: raw.console_host ?? null,
    consoleType: raw.console_type ?? null,
    status: raw.status,
    x: raw.x ?? 0,
    y: raw.y ?? 0,
  }));

export const RawLinkSchema = z
  .object({
    link_id: z.string(),
    nodes: z.array(
      z.object({
        node_id: z.string(),
        adapter_number: z.number().int().optional(),
        port_number: z.number().int().optional(),
      })
    ),
  })
  .transform((raw): PlatformLink => ({
    linkId: raw.link_id,
    nodes: raw.nodes.map(end => ({
      nodeId: end.node_id,
      adapterNumber: end.adapter_number,
      portNumber: end.port_number,
    })),
  }));

export const RawTemplateSchema = z
  .object({ template_id: z.string(), name: z.string() })
  .transform((raw): PlatformTemplate => ({ templateId: raw.template_id, name: raw.name }));

export const RawProjectSchema = z
  .object({ project_id: z.string(), name: z.string(), status: z.string().optional() })
  .transform((raw): PlatformProject => ({ projectId: raw.project_id, name: raw.name, status: raw.status }));

export const PlatformClientConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:3080'),
  username: z.string().optional(),
  password: z.string().optional(),
  timeoutMs: z.number().int().positive().default(30000),
});

export type PlatformClientConfig = z.infer<typeof PlatformClientConfigSchema>;
export type PlatformClientConfigInput = z.input<typeof PlatformClientConfigSchema>;
