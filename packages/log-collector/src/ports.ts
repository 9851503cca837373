import { PortAllocationError, type PlatformLink } from '@labwright/core';

export interface AdapterRange {
  min: number;
  max: number;
}

export const DEFAULT_ADAPTER_RANGE: AdapterRange = { min: 1, max: 15 };

export function usedAdapters(links: readonly PlatformLink[], nodeId: string): Set<number> {
  const used = new Set<number>();
  for (const link of links) {
    for (const end of link.nodes) {
      if (end.nodeId === nodeId) used.add(end.adapterNumber ?? 0);
    }
  }
  return used;
}

/**
 * Highest free adapter on the switch, searching down from the top of the
 * range so scenario links on the low adapters are left alone. Adapter 0 is
 * never handed out.
 */
export function findAvailableAdapter(
  links: readonly PlatformLink[],
  switchNode: { nodeId: string; name: string },
  range: AdapterRange = DEFAULT_ADAPTER_RANGE
): number {
  const used = usedAdapters(links, switchNode.nodeId);
  const floor = Math.max(range.min, 1);

  for (let adapter = range.max; adapter >= floor; adapter--) {
    if (!used.has(adapter)) return adapter;
  }

  throw new PortAllocationError(switchNode.name, floor, range.max);
}
