import { z } from 'zod';
import type { NodeKind } from './types';

export const ClassificationPolicySchema = z.object({
  switchKeywords: z.array(z.string().min(1)).default(['switch', 'openvswitch', 'ovs']),
  serverKeywords: z.array(z.string().min(1)).default(['dhcp', 'dnsmasq']),
  firewallKeywords: z.array(z.string().min(1)).default(['firewall']),
  collectorKeywords: z.array(z.string().min(1)).default(['collector']),
});
export type ClassificationPolicy = z.infer<typeof ClassificationPolicySchema>;

export const DEFAULT_CLASSIFICATION: ClassificationPolicy = ClassificationPolicySchema.parse({});

function matchesAny(lowered: string, keywords: readonly string[]): boolean {
  return keywords.some(keyword => lowered.includes(keyword.toLowerCase()));
}

/**
 * Case-insensitive substring match over operator-chosen names.
 * Precedence: server, switch, collector, firewall, plain.
 */
export function classifyNode(
  name: string | null | undefined,
  policy: ClassificationPolicy = DEFAULT_CLASSIFICATION
): NodeKind {
  const lowered = (name ?? '').toLowerCase();
  if (matchesAny(lowered, policy.serverKeywords)) return 'server';
  if (matchesAny(lowered, policy.switchKeywords)) return 'switch';
  if (matchesAny(lowered, policy.collectorKeywords)) return 'collector';
  if (matchesAny(lowered, policy.firewallKeywords)) return 'firewall';
  return 'plain';
}

export function isCollectorName(
  name: string | null | undefined,
  policy: ClassificationPolicy = DEFAULT_CLASSIFICATION
): boolean {
  return matchesAny((name ?? '').toLowerCase(), policy.collectorKeywords);
}

/**
 * Switch or collector keywords anywhere in the name. Unlike `classifyNode`
 * there is no precedence: `dhcplab-IT-Collector` is still a collector.
 */
export function isInfrastructure(
  name: string | null | undefined,
  policy: ClassificationPolicy = DEFAULT_CLASSIFICATION
): boolean {
  const lowered = (name ?? '').toLowerCase();
  return matchesAny(lowered, policy.switchKeywords) || matchesAny(lowered, policy.collectorKeywords);
}
