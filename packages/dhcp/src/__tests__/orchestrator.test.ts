import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  ConfigFormatError,
  type ConfigDocument,
  type ConsoleConnector,
  type IConfigStore,
  type NodeExecutionResult,
} from '@labwright/core';
import { JsonConfigStore } from '@labwright/platform';
import {
  MemoryConfigStore,
  ScriptedConsoleFarm,
  configDocument,
  dhclientOutput,
  fixtures,
  ipAddrOutput,
  silentLogger,
} from '@labwright/test-utils';
import { DhcpOrchestrator } from '../orchestrator';

const NO_DELAYS = { startReadMs: 0, ipShowReadMs: 0, interCommandDelayMs: 0 };
const { dhcpServer, workstation, itSwitch, noConsole } = fixtures.records;

function scriptedLab(): ScriptedConsoleFarm {
  const farm = new ScriptedConsoleFarm();
  farm.script(5001, { replies: { '/usr/local/bin/start.sh': 'Starting dnsmasq\r\n' } });
  farm.script(5002, {
    replies: {
      'dhclient -v -1': dhclientOutput('10.0.0.5'),
      'ip -4 addr show': ipAddrOutput('10.0.0.5'),
    },
  });
  farm.script(5003);
  return farm;
}

function orchestrator(
  store: IConfigStore,
  farm: ScriptedConsoleFarm,
  connect: ConsoleConnector = farm.connect
): DhcpOrchestrator {
  return new DhcpOrchestrator(store, { connect, logger: silentLogger(), options: NO_DELAYS });
}

describe('DhcpOrchestrator', () => {
  it('starts the server, leases the client and writes the store once', async () => {
    const store = new MemoryConfigStore(configDocument([dhcpServer, workstation]));
    const farm = scriptedLab();

    const result = await orchestrator(store, farm).assign();

    expect(result.serverResults).toEqual([
      {
        name: 'DHCP-Server-1',
        host: '127.0.0.1',
        port: 5001,
        action: 'start-server',
        success: true,
        output: 'Starting dnsmasq\r\n',
        error: null,
        assignedIp: null,
      },
    ]);
    expect(result.clientResults).toHaveLength(1);
    expect(result.clientResults[0]).toMatchObject({
      name: 'Workstation-1',
      host: '192.168.56.10',
      port: 5002,
      action: 'dhclient',
      success: true,
      assignedIp: '10.0.0.5',
    });
    expect(result.changed).toBe(true);
    expect(result.changedNodes).toEqual(['Workstation-1']);
    expect(result.backupPath).toBe('/memory/config.backup.json');

    expect(store.backups).toBe(1);
    expect(store.writes).toBe(1);
    expect(store.current.nodes[1]).toEqual({ ...workstation, assignedIp: '10.0.0.5' });
    expect(farm.commandsFor(5002)).toEqual(['dhclient -v -1', 'ip -4 addr show']);
  });

  it('does not write when a second run finds the same addresses', async () => {
    const store = new MemoryConfigStore(configDocument([dhcpServer, workstation]));
    const farm = scriptedLab();
    const subject = orchestrator(store, farm);

    await subject.assign();
    const second = await subject.assign();

    expect(second.changed).toBe(false);
    expect(second.changedNodes).toEqual([]);
    expect(second.backupPath).toBeNull();
    expect(store.writes).toBe(1);
    expect(store.backups).toBe(1);
  });

  it('skips switches and never dials nodes without a console port', async () => {
    const store = new MemoryConfigStore(configDocument([dhcpServer, workstation, itSwitch, noConsole]));
    const farm = scriptedLab();

    const result = await orchestrator(store, farm).assign();

    expect(result.clientResults.map(r => [r.name, r.success, r.output === 'skipped' ? 'skipped' : r.error])).toEqual([
      ['Workstation-1', true, null],
      ['IT-Switch', true, 'skipped'],
      ['Printer-1', false, 'Missing console settings'],
    ]);
    expect(farm.dialedPorts()).toEqual([5001, 5002]);
    expect(result.changedNodes).toEqual(['Workstation-1', 'Printer-1']);
    expect(store.current.nodes[3]).toEqual({ ...noConsole, assignedIp: null });
  });

  it('reports a server without console settings', async () => {
    const store = new MemoryConfigStore(configDocument([{ name: 'dnsmasq-1', consolePort: null }]));
    const farm = new ScriptedConsoleFarm();

    const result = await orchestrator(store, farm).assign();

    expect(result.serverResults).toEqual([
      {
        name: 'dnsmasq-1',
        host: '',
        port: 0,
        action: 'start-server',
        success: false,
        output: null,
        error: 'Missing console settings',
        assignedIp: null,
      },
    ]);
    expect(result.clientResults).toEqual([]);
    expect(farm.dialed).toEqual([]);
    expect(store.writes).toBe(0);
  });

  it('clears the stored address when the console cannot be reached', async () => {
    const store = new MemoryConfigStore(configDocument([{ ...workstation, assignedIp: '10.0.0.9' }]));
    const farm = new ScriptedConsoleFarm();

    const result = await orchestrator(store, farm).assign();

    expect(result.clientResults[0]).toMatchObject({
      success: false,
      error: 'Console 192.168.56.10:5002 unreachable: connection refused',
      assignedIp: null,
    });
    expect(result.changedNodes).toEqual(['Workstation-1']);
    expect(store.current.nodes[0]).toEqual({ ...workstation, assignedIp: null });
  });

  it('records a lease without an address as null', async () => {
    const store = new MemoryConfigStore(configDocument([{ ...workstation, assignedIp: '10.0.0.9' }]));
    const farm = new ScriptedConsoleFarm();
    farm.script(5002, { replies: { 'ip -4 addr show': '    inet 127.0.0.1/8 scope host lo\r\n' } });

    const result = await orchestrator(store, farm).assign();

    expect(result.clientResults[0]).toMatchObject({ success: true, assignedIp: null });
    expect(store.current.nodes[0]).toEqual({ ...workstation, assignedIp: null });
  });

  it('dials the override host and passes the dhclient window through', async () => {
    const store = new MemoryConfigStore(configDocument([dhcpServer, workstation]));
    const farm = scriptedLab();

    await orchestrator(store, farm).assign({ consoleHost: '10.9.9.9', dhclientTimeoutMs: 2000 });

    expect(farm.dialed).toEqual([
      { host: '10.9.9.9', port: 5001 },
      { host: '10.9.9.9', port: 5002 },
    ]);
  });

  it('emits one frozen result per node step', async () => {
    const store = new MemoryConfigStore(configDocument([dhcpServer, workstation, itSwitch]));
    const subject = orchestrator(store, scriptedLab());
    const seen: NodeExecutionResult[] = [];
    subject.on('result', outcome => seen.push(outcome));

    await subject.assign();

    expect(seen.map(outcome => `${outcome.action}:${outcome.name}`)).toEqual([
      'start-server:DHCP-Server-1',
      'dhclient:Workstation-1',
      'dhclient:IT-Switch',
    ]);
    expect(seen.every(outcome => Object.isFrozen(outcome))).toBe(true);
  });

  it('rejects a document without a nodes list before dialing', async () => {
    const malformed: ConfigDocument = JSON.parse('{"projectName": "lab-1", "nodes": {"PC-1": {}}}');
    const store = new MemoryConfigStore({ nodes: [] });
    store.load = async () => malformed;
    const farm = scriptedLab();

    await expect(orchestrator(store, farm).assign()).rejects.toBeInstanceOf(ConfigFormatError);
    expect(farm.dialed).toEqual([]);
  });

  describe('warm-up', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('waits once between the server phase and the client phase', async () => {
      vi.useFakeTimers();
      const second = { ...workstation, name: 'Workstation-2', nodeId: 'n-ws2', consolePort: 5004 };
      const store = new MemoryConfigStore(configDocument([dhcpServer, workstation, second]));
      const farm = scriptedLab();
      farm.script(5004, { replies: { 'ip -4 addr show': ipAddrOutput('10.0.0.6') } });

      const started = Date.now();
      const dials: Array<[number, number]> = [];
      const connect: ConsoleConnector = target => {
        dials.push([target.port, Date.now() - started]);
        return farm.connect(target);
      };

      const pending = orchestrator(store, farm, connect).assign({ warmupMs: 3000 });

      await vi.advanceTimersByTimeAsync(2999);
      expect(dials).toEqual([[5001, 0]]);
      expect(farm.commandsFor(5001)).toEqual(['/usr/local/bin/start.sh']);

      await vi.advanceTimersByTimeAsync(1);
      const result = await pending;

      expect(dials).toEqual([
        [5001, 0],
        [5002, 3000],
        [5004, 3000],
      ]);
      expect(result.changedNodes).toEqual(['Workstation-1', 'Workstation-2']);
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('with the generated record file', () => {
    let dir: string;

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('dials snake_case records and writes the lease back as assigned_ip', async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'labwright-dhcp-'));
      const file = path.join(dir, 'config.generated.json');
      await fs.writeFile(
        file,
        JSON.stringify({
          project_name: 'lab-1',
          nodes: [{ name: 'Workstation-1', console: 5002, console_host: '192.168.56.10', assigned_ip: '10.0.0.9' }],
        })
      );
      const farm = scriptedLab();

      const result = await orchestrator(new JsonConfigStore(file, { logger: silentLogger() }), farm).assign();

      expect(farm.dialed).toEqual([{ host: '192.168.56.10', port: 5002 }]);
      expect(result.clientResults[0]).toMatchObject({ success: true, error: null, assignedIp: '10.0.0.5' });
      expect(result.backupPath).toBe(path.join(dir, 'config.generated.backup.json'));
      expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual({
        project_name: 'lab-1',
        nodes: [{ name: 'Workstation-1', console: 5002, console_host: '192.168.56.10', assigned_ip: '10.0.0.5' }],
      });
    });
  });
});
