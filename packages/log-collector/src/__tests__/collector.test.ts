import { describe, it, expect } from 'vitest';
import type { PlatformLink, PlatformNode, SnitchNodeInfo } from '@labwright/core';
import {
  FakePlatformClient,
  ScriptedConsoleFarm,
  dhclientOutput,
  hostnameOutput,
  platformNode,
  silentLogger,
} from '@labwright/test-utils';
import { LogCollector, type InjectedEvent } from '../collector';
import { buildPromptCommand, persistToBashrc } from '../commands';
import { NO_COLLECTORS_MESSAGE, retrieveAllLogs, setupLoggingForStudent, teardownLoggingForStudent } from '../workflows';

const NO_WAIT = {
  bootWaitMs: 0,
  consoleSettleMs: 0,
  drainTimeoutMs: 0,
  probeReadMs: 0,
  dhclientReadMs: 0,
  dhcpWaitMs: 0,
  syslogStartWaitMs: 0,
  logReadMs: 0,
};

const IT_CONFIG = { nameSuffix: 'IT-Collector', switchName: 'IT-Switch' };

function labNodes(): PlatformNode[] {
  return [
    platformNode({ name: 'IT-Switch', nodeId: 'sw-it', consoleType: null, x: 100, y: 50 }),
    platformNode({ name: 'OT-Switch', nodeId: 'sw-ot', consolePort: 5003, x: 400, y: 50 }),
    platformNode({ name: 'Workstation-1', nodeId: 'n-ws1', consolePort: 5002 }),
    platformNode({ name: 'PLC-OT-1', nodeId: 'n-plc', consolePort: 5004 }),
    platformNode({ name: 'Firewall-1', nodeId: 'n-fw', consolePort: 5900, consoleType: 'vnc' }),
    platformNode({ name: 'Printer-1', nodeId: 'n-printer' }),
  ];
}

function labLinks(): PlatformLink[] {
  return [
    {
      linkId: 'l-1',
      nodes: [
        { nodeId: 'n-ws1', adapterNumber: 0, portNumber: 0 },
        { nodeId: 'sw-it', adapterNumber: 15, portNumber: 0 },
      ],
    },
    {
      linkId: 'l-2',
      nodes: [
        { nodeId: 'n-printer', adapterNumber: 0, portNumber: 0 },
        { nodeId: 'sw-it', adapterNumber: 14, portNumber: 0 },
      ],
    },
    {
      linkId: 'l-3',
      nodes: [{ nodeId: 'n-plc', adapterNumber: 0, portNumber: 0 }, { nodeId: 'sw-ot' }],
    },
  ];
}

// New collectors get console ports 5100 (IT) and 5101 (OT)
function collectorConsoles(farm: ScriptedConsoleFarm): void {
  farm.script(5100, {
    replies: {
      'hostname -I': hostnameOutput('10.0.0.50'),
      'pgrep syslog-ng': 'pgrep syslog-ng\r\n412\r\n/ # ',
    },
  });
  farm.script(5101, {
    replies: {
      'hostname -I': [hostnameOutput(), hostnameOutput('169.254.7.7', '10.0.1.50')],
      'dhclient -v -1': dhclientOutput('10.0.1.50'),
      'pgrep syslog-ng': ['pgrep syslog-ng\r\n/ # ', 'pgrep syslog-ng\r\n977\r\n/ # '],
    },
  });
  farm.script(5002);
  farm.script(5004);
}

function collectorFor(platform: FakePlatformClient, farm: ScriptedConsoleFarm): LogCollector {
  return new LogCollector(platform, 'p-1', {
    connect: farm.connect,
    logger: silentLogger(),
    options: { timings: NO_WAIT },
  });
}

describe('LogCollector', () => {
  describe('setupLoggingForStudent', () => {
    it('deploys both collectors and injects the audit hook', async () => {
      const platform = new FakePlatformClient({ nodes: labNodes(), links: labLinks() });
      const farm = new ScriptedConsoleFarm();
      collectorConsoles(farm);
      const collector = collectorFor(platform, farm);
      const ready: SnitchNodeInfo[] = [];
      const injected: InjectedEvent[] = [];
      collector.on('collector', info => ready.push(info));
      collector.on('injected', event => injected.push(event));

      const result = await setupLoggingForStudent(collector, 'alice');

      expect(result.snitchNodes).toEqual([
        {
          nodeId: 'node-1',
          name: 'alice-IT-Collector',
          ipAddress: '10.0.0.50',
          port: 514,
          connectedToSwitch: 'IT-Switch',
          consolePort: 5100,
          consoleHost: '192.168.56.10',
        },
        {
          nodeId: 'node-3',
          name: 'alice-OT-Collector',
          ipAddress: '10.0.1.50',
          port: 514,
          connectedToSwitch: 'OT-Switch',
          consolePort: 5101,
          consoleHost: '192.168.56.10',
        },
      ]);
      expect(result.errors).toEqual([]);
      expect(result.reusedExisting).toBe(false);
      expect(result.injectedNodes).toEqual(['Workstation-1', 'PLC-OT-1']);
      expect(result.skippedNodes).toEqual([
        'IT-Switch (console_type=none)',
        'OT-Switch (infrastructure node)',
        'Firewall-1 (console_type=vnc)',
        'alice-IT-Collector (infrastructure node)',
        'alice-OT-Collector (infrastructure node)',
        'Printer-1 (no console)',
      ]);

      expect(ready.map(info => info.name)).toEqual(['alice-IT-Collector', 'alice-OT-Collector']);
      expect(injected).toEqual([
        { name: 'Workstation-1', collector: 'alice-IT-Collector', collectorIp: '10.0.0.50' },
        { name: 'PLC-OT-1', collector: 'alice-OT-Collector', collectorIp: '10.0.1.50' },
      ]);
    });

    it('places and wires new collectors beside their switches', async () => {
      const platform = new FakePlatformClient({ nodes: labNodes(), links: labLinks() });
      const farm = new ScriptedConsoleFarm();
      collectorConsoles(farm);

      await setupLoggingForStudent(collectorFor(platform, farm), 'alice');

      expect(platform.created.map(node => [node.name, node.x, node.y])).toEqual([
        ['alice-IT-Collector', 250, 150],
        ['alice-OT-Collector', 550, 150],
      ]);
      expect(platform.linked).toEqual([
        [
          { nodeId: 'node-1', adapterNumber: 0, portNumber: 0 },
          { nodeId: 'sw-it', adapterNumber: 13, portNumber: 0 },
        ],
        [
          { nodeId: 'node-3', adapterNumber: 0, portNumber: 0 },
          { nodeId: 'sw-ot', adapterNumber: 15, portNumber: 0 },
        ],
      ]);
      expect(platform.started).toEqual(['node-1', 'node-3']);
      expect(platform.templateCalls).toBe(1);
    });

    it('falls back to dhclient and starts syslog-ng when needed', async () => {
      const platform = new FakePlatformClient({ nodes: labNodes(), links: labLinks() });
      const farm = new ScriptedConsoleFarm();
      collectorConsoles(farm);

      await setupLoggingForStudent(collectorFor(platform, farm), 'alice');

      expect(farm.commandsFor(5100)).toEqual(['hostname -I', 'pgrep syslog-ng']);
      expect(farm.commandsFor(5101)).toEqual([
        'hostname -I',
        'dhclient -v -1',
        'hostname -I',
        'pgrep syslog-ng',
        'syslog-ng',
        'pgrep syslog-ng',
      ]);
    });

    it('sets the hook for the session and in bashrc', async () => {
      const platform = new FakePlatformClient({ nodes: labNodes(), links: labLinks() });
      const farm = new ScriptedConsoleFarm();
      collectorConsoles(farm);

      await setupLoggingForStudent(collectorFor(platform, farm), 'alice');

      const hook = buildPromptCommand('10.0.1.50', 514, 'Student-CMD');
      expect(farm.commandsFor(5004)).toEqual([hook, persistToBashrc(hook)]);
      expect(farm.commandsFor(5002)[0]).toBe(
        `export PROMPT_COMMAND='history -a >(tee -a ~/.bash_history | logger -n 10.0.0.50 -P 514 -t "Student-CMD")'`
      );
      expect(farm.sessions.every(session => session.closed)).toBe(true);
    });

    it('collects per-collector errors and keeps going', async () => {
      const platform = new FakePlatformClient({
        nodes: labNodes().filter(node => node.name !== 'OT-Switch'),
        links: labLinks(),
      });
      const farm = new ScriptedConsoleFarm();
      farm.script(5100, { replies: { 'hostname -I': hostnameOutput('127.0.0.1') } });

      const result = await setupLoggingForStudent(collectorFor(platform, farm), 'alice');

      expect(result.errors).toEqual([
        'Failed to obtain IP for IT-Collector - ensure DHCP server is running or assign static IP',
        "Failed to setup OT-Collector: Switch 'OT-Switch' not found in project",
      ]);
      expect(result.snitchNodes).toEqual([]);
      expect(result.injectedNodes).toEqual([]);
      expect(farm.commandsFor(5002)).toEqual([]);
    });

    it('reports the generic message when nothing was attempted', async () => {
      const platform = new FakePlatformClient({ nodes: labNodes(), links: labLinks() });
      const collector = collectorFor(platform, new ScriptedConsoleFarm());

      const setup = await collector.setupCollectors('alice', []);
      expect(setup).toEqual({ snitchNodes: [], errors: [], reusedExisting: false });
      expect(NO_COLLECTORS_MESSAGE).toBe(
        'No collectors could be deployed. Ensure DHCP server is running or assign static IPs.'
      );
    });
  });

  describe('setupCollectors', () => {
    it('reuses an existing collector without rewiring it', async () => {
      const existing = platformNode({ name: 'alice-IT-Collector', nodeId: 'c-it', consolePort: 5100 });
      const platform = new FakePlatformClient({ nodes: [...labNodes(), existing], links: labLinks() });
      const farm = new ScriptedConsoleFarm();
      collectorConsoles(farm);

      const setup = await collectorFor(platform, farm).setupCollectors('alice', [IT_CONFIG]);

      expect(setup.reusedExisting).toBe(true);
      expect(setup.snitchNodes.map(info => info.nodeId)).toEqual(['c-it']);
      expect(platform.created).toEqual([]);
      expect(platform.linked).toEqual([]);
      expect(platform.templateCalls).toBe(0);
      expect(platform.started).toEqual(['c-it']);
    });

    it('carries on when the start request is rejected', async () => {
      const existing = platformNode({ name: 'alice-IT-Collector', nodeId: 'c-it', consolePort: 5100 });
      const platform = new FakePlatformClient({ nodes: [...labNodes(), existing], links: labLinks() });
      platform.failStart.add('c-it');
      const farm = new ScriptedConsoleFarm();
      collectorConsoles(farm);

      const setup = await collectorFor(platform, farm).setupCollectors('alice', [IT_CONFIG]);

      expect(platform.started).toEqual(['c-it']);
      expect(setup.errors).toEqual([]);
      expect(setup.snitchNodes.map(info => [info.name, info.ipAddress])).toEqual([['alice-IT-Collector', '10.0.0.50']]);
    });

    it('fails only the collector whose switch is full', async () => {
      const full: PlatformLink[] = Array.from({ length: 15 }, (_, i) => ({
        linkId: `full-${i}`,
        nodes: [{ nodeId: 'sw-it', adapterNumber: i + 1, portNumber: 0 }],
      }));
      const platform = new FakePlatformClient({ nodes: labNodes(), links: full });
      const farm = new ScriptedConsoleFarm();
      collectorConsoles(farm);

      const setup = await collectorFor(platform, farm).setupCollectors('alice', [
        IT_CONFIG,
        { nameSuffix: 'OT-Collector', switchName: 'OT-Switch' },
      ]);

      expect(setup.errors).toEqual([
        "Failed to setup IT-Collector: No available ports on node 'IT-Switch' (adapters 1-15 all in use)",
      ]);
      // the IT node was created first and holds 5100, so the OT node gets 5101
      expect(setup.snitchNodes.map(info => info.name)).toEqual(['alice-OT-Collector']);
    });

    it('fails when the collector template is missing', async () => {
      const platform = new FakePlatformClient({ nodes: labNodes(), links: labLinks(), templates: [] });
      const setup = await collectorFor(platform, new ScriptedConsoleFarm()).setupCollectors('alice', [IT_CONFIG]);

      expect(setup.errors).toEqual([
        "Failed to setup IT-Collector: Template 'syslog-collector' not found on the platform",
      ]);
    });

    it('keeps a collector whose syslog-ng could not be confirmed', async () => {
      const platform = new FakePlatformClient({ nodes: labNodes(), links: labLinks() });
      const farm = new ScriptedConsoleFarm();
      farm.script(5100, { replies: { 'hostname -I': hostnameOutput('10.0.0.50') } });

      const setup = await collectorFor(platform, farm).setupCollectors('alice', [IT_CONFIG]);

      expect(setup.errors).toEqual(['Warning: syslog-ng may not be running on IT-Collector']);
      expect(setup.snitchNodes).toHaveLength(1);
      expect(farm.commandsFor(5100)).toEqual(['hostname -I', 'pgrep syslog-ng', 'syslog-ng', 'pgrep syslog-ng']);
    });
  });

  describe('findEligibleNodes', () => {
    it('never targets a collector, even one named like a server', async () => {
      const platform = new FakePlatformClient({
        nodes: [
          platformNode({ name: 'dhcplab-IT-Collector', nodeId: 'c1', consolePort: 5100 }),
          platformNode({ name: 'Workstation-1', nodeId: 'n-ws1', consolePort: 5002 }),
        ],
      });

      const { eligible, skipped } = await collectorFor(platform, new ScriptedConsoleFarm()).findEligibleNodes();

      expect(eligible.map(node => node.name)).toEqual(['Workstation-1']);
      expect(skipped).toEqual(['dhcplab-IT-Collector (infrastructure node)']);
    });
  });

  describe('log retrieval', () => {
    it('returns cleaned logs keyed by zone', async () => {
      const platform = new FakePlatformClient();
      const farm = new ScriptedConsoleFarm();
      farm.script(5100, {
        replies: {
          'cat /var/log/student.log': [
            'cat /var/log/student.log',
            'Oct 18 10:00:01 ws1 Student-CMD: ls -la',
            'Oct 18 10:00:05 ws1 Student-CMD: whoami',
            '/ # ',
          ].join('\r\n'),
        },
      });
      farm.script(5101, { replies: { 'cat /var/log/student.log': 'cat /var/log/student.log\r\n/ # ' } });

      const { logs, errors } = await retrieveAllLogs(collectorFor(platform, farm), [
        { name: 'alice-IT-Collector', consolePort: 5100, consoleHost: '192.168.56.10' },
        { name: 'alice-OT-Collector', consolePort: 5101, consoleHost: '192.168.56.10' },
        { name: 'Backup-Collector', consolePort: null, consoleHost: null },
      ]);

      expect(logs).toEqual({
        it: 'Oct 18 10:00:01 ws1 Student-CMD: ls -la\nOct 18 10:00:05 ws1 Student-CMD: whoami',
        ot: '',
        'backup-collector': '',
      });
      expect(errors).toEqual([
        'alice-OT-Collector: Log file is empty - commands may not be reaching the collector',
        'Failed to retrieve logs from Backup-Collector: No console port for Backup-Collector',
      ]);
    });

    it('records an empty log for an unreachable collector', async () => {
      const { logs, errors } = await retrieveAllLogs(
        collectorFor(new FakePlatformClient(), new ScriptedConsoleFarm()),
        [{ name: 'alice-IT-Collector', consolePort: 5100, consoleHost: '0.0.0.0' }]
      );

      expect(logs).toEqual({ it: '' });
      expect(errors).toEqual([
        'Failed to retrieve logs from alice-IT-Collector: Console 127.0.0.1:5100 unreachable: connection refused',
      ]);
    });
  });

  describe('teardown', () => {
    it('deletes only the student collectors', async () => {
      const platform = new FakePlatformClient({
        nodes: [
          platformNode({ name: 'alice-IT-Collector', nodeId: 'c1' }),
          platformNode({ name: 'alice-OT-Collector', nodeId: 'c2' }),
          platformNode({ name: 'bob-IT-Collector', nodeId: 'c3' }),
          platformNode({ name: 'alice-Workstation', nodeId: 'w1' }),
          platformNode({ name: 'alicia-IT-Collector', nodeId: 'c4' }),
        ],
      });
      platform.failDelete.add('c2');

      const outcome = await teardownLoggingForStudent(
        collectorFor(platform, new ScriptedConsoleFarm()),
        'alice'
      );

      expect(outcome).toEqual({ deleted: ['alice-IT-Collector'], errors: ['Failed to delete alice-OT-Collector'] });
      expect(platform.deleted).toEqual(['c1']);
    });

    it('finds collectors of a student whose name contains a switch keyword', async () => {
      const platform = new FakePlatformClient({
        nodes: [
          platformNode({ name: 'Petrovs-IT-Collector', nodeId: 'c1' }),
          platformNode({ name: 'Petrovs-OT-Collector', nodeId: 'c2' }),
          platformNode({ name: 'Petrovs-Switch', nodeId: 'sw' }),
        ],
      });
      const collector = collectorFor(platform, new ScriptedConsoleFarm());

      expect((await collector.findStudentCollectors('Petrovs')).map(node => node.nodeId)).toEqual(['c1', 'c2']);
      expect(await teardownLoggingForStudent(collector, 'Petrovs')).toEqual({
        deleted: ['Petrovs-IT-Collector', 'Petrovs-OT-Collector'],
        errors: [],
      });
      expect(platform.deleted).toEqual(['c1', 'c2']);
    });
  });
});
