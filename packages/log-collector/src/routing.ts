import {
  LookupError,
  isInfrastructure,
  type ClassificationPolicy,
  type PlatformNode,
} from '@labwright/core';
import type { ZoneRouting } from './config';

export interface CollectorHandle {
  name: string;
  consolePort: number | null;
  consoleHost: string | null;
}

export type Eligibility = { eligible: true } | { eligible: false; reason: string };

export function checkEligibility(node: PlatformNode, policy: ClassificationPolicy): Eligibility {
  if (node.consoleType !== 'telnet') {
    return { eligible: false, reason: `${node.name} (console_type=${node.consoleType ?? 'none'})` };
  }
  if (isInfrastructure(node.name, policy)) {
    return { eligible: false, reason: `${node.name} (infrastructure node)` };
  }
  return { eligible: true };
}

/**
 * Routed-zone nodes go to the routed collector; everything else to the
 * default-zone collector, falling back to the first one.
 */
export function selectCollector<T extends { name: string }>(
  nodeName: string,
  collectors: readonly T[],
  routing: ZoneRouting
): T {
  if (collectors.length === 0) {
    throw new LookupError('No collectors available');
  }

  const routed = routing.routedZone.toUpperCase();
  const fallback = routing.defaultZone.toUpperCase();

  if (nodeName.toUpperCase().includes(routed)) {
    const match = collectors.find(collector => collector.name.toUpperCase().includes(routed));
    if (match) return match;
  }

  return collectors.find(collector => collector.name.toUpperCase().includes(fallback)) ?? collectors[0];
}

/** Result key for a collector's logs: the zone it serves, else its name. */
export function zoneKey(collectorName: string, routing: ZoneRouting): string {
  const upper = collectorName.toUpperCase();
  if (upper.includes(routing.defaultZone.toUpperCase())) return routing.defaultZone.toLowerCase();
  if (upper.includes(routing.routedZone.toUpperCase())) return routing.routedZone.toLowerCase();
  return collectorName.toLowerCase();
}
