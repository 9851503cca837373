import { EventEmitter } from 'eventemitter3';
import pino, { type Logger } from 'pino';
import {
  ConfigDocument,
  ConfigFormatError,
  DEFAULT_CLASSIFICATION,
  classifyNode,
  errorMessage,
  extractFirstIpv4,
  sleep,
  type ClassificationPolicy,
  type ConsoleConnector,
  type IConfigStore,
  type NodeAction,
  type NodeExecutionResult,
  type NodeKind,
} from '@labwright/core';
import { createConnector, resolveConsoleTarget, runCommand, runCommandSequence } from '@labwright/console';
import { DhcpOptionsSchema, type DhcpOptions, type DhcpOptionsInput } from './config';

export const MISSING_CONSOLE = 'Missing console settings';

export interface AssignParams {
  consoleHost?: string | null;
  dhclientTimeoutMs?: number;
  warmupMs?: number;
}

export interface DhcpAssignResult {
  serverResults: NodeExecutionResult[];
  clientResults: NodeExecutionResult[];
  changed: boolean;
  changedNodes: string[];
  backupPath: string | null;
}

export interface DhcpOrchestratorEvents {
  result: (result: NodeExecutionResult) => void;
}

export interface DhcpOrchestratorDeps {
  connect?: ConsoleConnector;
  classification?: ClassificationPolicy;
  options?: DhcpOptionsInput;
  logger?: Logger;
}

type MutableRecord = Record<string, unknown>;

interface WorkingNode {
  record: MutableRecord;
  name: string;
  kind: NodeKind;
}

function isObject(value: unknown): value is MutableRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function result(
  fields: Partial<NodeExecutionResult> & Pick<NodeExecutionResult, 'name' | 'action' | 'success'>
): NodeExecutionResult {
  return Object.freeze({
    host: '',
    port: 0,
    output: null,
    error: null,
    assignedIp: null,
    ...fields,
  });
}

/**
 * Starts DHCP services on server nodes, then has every client node request a
 * lease and records the address it got. Nodes are handled one at a time and a
 * failing node never stops the batch.
 */
export class DhcpOrchestrator extends EventEmitter<DhcpOrchestratorEvents> {
  private connect: ConsoleConnector;
  private classification: ClassificationPolicy;
  private options: DhcpOptions;
  private logger: Logger;

  constructor(private store: IConfigStore, deps: DhcpOrchestratorDeps = {}) {
    super();
    this.logger = deps.logger ?? pino({ name: 'dhcp-orchestrator' });
    this.connect = deps.connect ?? createConnector({ logger: this.logger.child({ component: 'console' }) });
    this.classification = deps.classification ?? DEFAULT_CLASSIFICATION;
    this.options = DhcpOptionsSchema.parse(deps.options ?? {});
  }

  async assign(params: AssignParams = {}): Promise<DhcpAssignResult> {
    const consoleHost = params.consoleHost !== undefined ? params.consoleHost : this.options.consoleHost;
    const dhclientTimeoutMs = params.dhclientTimeoutMs ?? this.options.dhclientTimeoutMs;
    const warmupMs = params.warmupMs ?? this.options.warmupMs;

    const loaded: unknown = await this.store.load();
    const parsed = ConfigDocument.safeParse(loaded);
    if (!parsed.success) {
      throw new ConfigFormatError("config missing 'nodes' list", { cause: parsed.error });
    }

    const working = structuredClone(parsed.data);
    const nodes: WorkingNode[] = working.nodes.filter(isObject).map(record => {
      const name = typeof record.name === 'string' ? record.name : '';
      return { record, name, kind: classifyNode(name, this.classification) };
    });

    const serverResults = await this.startServers(nodes, consoleHost);

    if (warmupMs > 0) {
      this.logger.info({ warmupMs }, 'Waiting for DHCP services to warm up');
      await sleep(warmupMs);
    }

    const changedNodes: string[] = [];
    const clientResults = await this.runClients(nodes, consoleHost, dhclientTimeoutMs, changedNodes);

    let backupPath: string | null = null;
    if (changedNodes.length > 0) {
      backupPath = await this.store.backup();
      await this.store.write(working);
      this.logger.info({ changedNodes, backupPath }, 'Assigned addresses saved');
    } else {
      this.logger.info('No address changes to save');
    }

    return {
      serverResults,
      clientResults,
      changed: changedNodes.length > 0,
      changedNodes,
      backupPath,
    };
  }

  private async startServers(nodes: WorkingNode[], consoleHost: string | null): Promise<NodeExecutionResult[]> {
    const results: NodeExecutionResult[] = [];

    for (const node of nodes) {
      if (node.kind !== 'server') continue;
      results.push(this.record(await this.startServer(node, consoleHost)));
    }

    return results;
  }

  private async startServer(node: WorkingNode, consoleHost: string | null): Promise<NodeExecutionResult> {
    const action: NodeAction = 'start-server';
    const target = resolveConsoleTarget(node.record, consoleHost);
    if (!target) {
      return result({ name: node.name, action, success: false, error: MISSING_CONSOLE });
    }

    try {
      const output = await runCommand(this.connect, target, this.options.startCommand, this.options.startReadMs);
      return result({ name: node.name, ...target, action, success: true, output });
    } catch (error) {
      return result({ name: node.name, ...target, action, success: false, error: errorMessage(error) });
    }
  }

  private async runClients(
    nodes: WorkingNode[],
    consoleHost: string | null,
    dhclientTimeoutMs: number,
    changedNodes: string[]
  ): Promise<NodeExecutionResult[]> {
    const results: NodeExecutionResult[] = [];

    for (const node of nodes) {
      if (node.kind === 'server') continue;
      if (node.kind === 'switch') {
        results.push(this.record(result({ name: node.name, action: 'dhclient', success: true, output: 'skipped' })));
        continue;
      }
      results.push(this.record(await this.runClient(node, consoleHost, dhclientTimeoutMs, changedNodes)));
    }

    return results;
  }

  private async runClient(
    node: WorkingNode,
    consoleHost: string | null,
    dhclientTimeoutMs: number,
    changedNodes: string[]
  ): Promise<NodeExecutionResult> {
    const action: NodeAction = 'dhclient';
    const target = resolveConsoleTarget(node.record, consoleHost);
    if (!target) {
      this.updateAddress(node, null, changedNodes);
      return result({ name: node.name, action, success: false, error: MISSING_CONSOLE });
    }

    try {
      const output = await runCommandSequence(
        this.connect,
        target,
        [
          [this.options.dhclientCommand, dhclientTimeoutMs],
          [this.options.ipShowCommand, this.options.ipShowReadMs],
        ],
        { interCommandDelayMs: this.options.interCommandDelayMs }
      );
      const assignedIp = extractFirstIpv4(output);
      this.updateAddress(node, assignedIp, changedNodes);
      return result({ name: node.name, ...target, action, success: true, output, assignedIp });
    } catch (error) {
      this.updateAddress(node, null, changedNodes);
      return result({ name: node.name, ...target, action, success: false, error: errorMessage(error) });
    }
  }

  // Only a real change is recorded; a missing key and null are the same
  private updateAddress(node: WorkingNode, assignedIp: string | null, changedNodes: string[]): void {
    const previous = node.record.assignedIp ?? null;
    if (previous === assignedIp) return;

    node.record.assignedIp = assignedIp;
    changedNodes.push(node.name);
  }

  private record(outcome: NodeExecutionResult): NodeExecutionResult {
    const level = outcome.success ? 'info' : 'warn';
    this.logger[level](
      {
        node: outcome.name,
        action: outcome.action,
        host: outcome.host,
        port: outcome.port,
        assignedIp: outcome.assignedIp,
        error: outcome.error,
      },
      outcome.success ? 'Node step finished' : 'Node step failed'
    );
    this.emit('result', outcome);
    return outcome;
  }
}
