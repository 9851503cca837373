/**
 * Shared fixtures for Labwright tests.
 * Console ports are unique per node so scripted consoles can be keyed by port.
 */

import type { ConfigDocument, NodeRecord, PlatformNode } from '@labwright/core';

const records: Record<'dhcpServer' | 'workstation' | 'itSwitch' | 'noConsole', NodeRecord> = {
  dhcpServer: {
    name: 'DHCP-Server-1',
    nodeId: 'n-dhcp',
    consolePort: 5001,
    consoleHost: '0.0.0.0',
    assignedIp: null,
  },

  workstation: {
    name: 'Workstation-1',
    nodeId: 'n-ws1',
    consolePort: 5002,
    consoleHost: '192.168.56.10',
    assignedIp: null,
  },

  itSwitch: {
    name: 'IT-Switch',
    nodeId: 'n-sw',
    consolePort: 5003,
    consoleHost: '192.168.56.10',
  },

  noConsole: {
    name: 'Printer-1',
    nodeId: 'n-printer',
    consoleHost: '192.168.56.10',
    assignedIp: '10.0.0.77',
  },
};

export const fixtures = { records };

export function configDocument(nodes: NodeRecord[]): ConfigDocument {
  return {
    projectName: 'lab-1',
    projectId: 'p-1',
    nodes: nodes.map(node => ({ ...node })),
  };
}

export function platformNode(overrides: Partial<PlatformNode> & { name: string; nodeId: string }): PlatformNode {
  return {
    consolePort: null,
    consoleHost: '192.168.56.10',
    consoleType: 'telnet',
    status: 'started',
    x: 0,
    y: 0,
    ...overrides,
  };
}
