import { EventEmitter } from 'eventemitter3';
import pino, { type Logger } from 'pino';
import {
  DEFAULT_CLASSIFICATION,
  LookupError,
  errorMessage,
  firstUsableAddress,
  isCollectorName,
  sleep,
  type ClassificationPolicy,
  type CollectorConfig,
  type ConsoleConnector,
  type IConsoleChannel,
  type IPlatformClient,
  type PlatformNode,
  type SnitchNodeInfo,
} from '@labwright/core';
import { createConnector, resolveConsoleTarget, withConsole } from '@labwright/console';
import { LogCollectorOptionsSchema, type LogCollectorOptions, type LogCollectorOptionsInput } from './config';
import {
  DHCLIENT_COMMAND,
  HOSTNAME_COMMAND,
  SYSLOG_PROBE_COMMAND,
  SYSLOG_START_COMMAND,
  buildPromptCommand,
  cleanLogOutput,
  hasPid,
  persistToBashrc,
  readLogCommand,
} from './commands';
import { findAvailableAdapter } from './ports';
import { checkEligibility, selectCollector, type CollectorHandle } from './routing';

export interface CollectorSetup {
  snitchNodes: SnitchNodeInfo[];
  errors: string[];
  reusedExisting: boolean;
}

export interface InjectionOutcome {
  injected: string[];
  skipped: string[];
  errors: string[];
}

export interface DeletionOutcome {
  deleted: string[];
  errors: string[];
}

export interface InjectedEvent {
  name: string;
  collector: string;
  collectorIp: string;
}

export interface LogCollectorEvents {
  collector: (info: SnitchNodeInfo) => void;
  injected: (event: InjectedEvent) => void;
}

export interface LogCollectorDeps {
  connect?: ConsoleConnector;
  classification?: ClassificationPolicy;
  options?: LogCollectorOptionsInput;
  logger?: Logger;
}

/**
 * Deploys syslog collector nodes for a student, wires them to their switches
 * and points every eligible node's shell history at them.
 */
export class LogCollector extends EventEmitter<LogCollectorEvents> {
  private connect: ConsoleConnector;
  private classification: ClassificationPolicy;
  private options: LogCollectorOptions;
  private logger: Logger;
  private templateId?: string;

  constructor(
    private client: IPlatformClient,
    private projectId: string,
    deps: LogCollectorDeps = {}
  ) {
    super();
    this.logger = deps.logger ?? pino({ name: 'log-collector' });
    this.connect = deps.connect ?? createConnector({ logger: this.logger.child({ component: 'console' }) });
    this.classification = deps.classification ?? DEFAULT_CLASSIFICATION;
    this.options = LogCollectorOptionsSchema.parse(deps.options ?? {});
  }

  get routing() {
    return this.options.routing;
  }

  async setupCollectors(studentName: string, configs: readonly CollectorConfig[]): Promise<CollectorSetup> {
    const snitchNodes: SnitchNodeInfo[] = [];
    const errors: string[] = [];
    let reusedExisting = false;

    for (const config of configs) {
      try {
        const { node, reused } = await this.createCollectorNode(studentName, config);
        reusedExisting = reusedExisting || reused;

        const current = await this.client.getNode(this.projectId, node.nodeId);
        if (!(await this.client.startNode(this.projectId, current.nodeId))) {
          this.logger.warn({ node: current.name }, 'Start request rejected, node may already be running');
        }
        await sleep(this.options.timings.bootWaitMs);

        const ipAddress = await this.acquireAddress(current);
        if (!ipAddress) {
          const message = `Failed to obtain IP for ${config.nameSuffix} - ensure DHCP server is running or assign static IP`;
          this.logger.error({ node: current.name }, message);
          errors.push(message);
          continue;
        }

        if (!(await this.ensureSyslogRunning(current))) {
          const message = `Warning: syslog-ng may not be running on ${config.nameSuffix}`;
          this.logger.warn({ node: current.name }, message);
          errors.push(message);
        }

        const info: SnitchNodeInfo = {
          nodeId: current.nodeId,
          name: current.name,
          ipAddress,
          port: this.options.syslogPort,
          connectedToSwitch: config.switchName,
          consolePort: current.consolePort !== null && current.consolePort > 0 ? current.consolePort : null,
          consoleHost: current.consoleHost || this.options.consoleHost,
        };
        snitchNodes.push(info);
        this.emit('collector', info);
        this.logger.info({ node: info.name, ipAddress, reused }, 'Collector ready');
      } catch (error) {
        const message = `Failed to setup ${config.nameSuffix}: ${errorMessage(error)}`;
        this.logger.error({ error: errorMessage(error) }, message);
        errors.push(message);
      }
    }

    return { snitchNodes, errors, reusedExisting };
  }

  /**
   * Address already configured on the node, else one leased with dhclient.
   * Console failures are logged and reported as no address.
   */
  async acquireAddress(node: PlatformNode): Promise<string | null> {
    const target = resolveConsoleTarget(node, this.options.consoleHost);
    if (!target) {
      this.logger.warn({ node: node.name }, 'No console target');
      return null;
    }

    const { probeReadMs, dhclientReadMs, dhcpWaitMs } = this.options.timings;
    try {
      return await withConsole(this.connect, target, async session => {
        await this.settle(session);

        const existing = firstUsableAddress(await session.runCommand(HOSTNAME_COMMAND, probeReadMs));
        if (existing) {
          this.logger.info({ node: node.name, ipAddress: existing }, 'Found existing address');
          return existing;
        }

        this.logger.info({ node: node.name }, 'No address yet, requesting a lease');
        await session.runCommand(DHCLIENT_COMMAND, dhclientReadMs);
        await sleep(dhcpWaitMs);
        return firstUsableAddress(await session.runCommand(HOSTNAME_COMMAND, probeReadMs));
      });
    } catch (error) {
      this.logger.error({ node: node.name, error: errorMessage(error) }, 'Address lookup failed');
      return null;
    }
  }

  async ensureSyslogRunning(node: PlatformNode): Promise<boolean> {
    const target = resolveConsoleTarget(node, this.options.consoleHost);
    if (!target) {
      this.logger.warn({ node: node.name }, 'No console target');
      return false;
    }

    const { probeReadMs, syslogStartWaitMs } = this.options.timings;
    try {
      return await withConsole(this.connect, target, async session => {
        await this.settle(session);

        if (hasPid(await session.runCommand(SYSLOG_PROBE_COMMAND, probeReadMs))) {
          return true;
        }

        this.logger.info({ node: node.name }, 'Starting syslog-ng');
        await session.runCommand(SYSLOG_START_COMMAND, probeReadMs);
        await sleep(syslogStartWaitMs);
        return hasPid(await session.runCommand(SYSLOG_PROBE_COMMAND, probeReadMs));
      });
    } catch (error) {
      this.logger.error({ node: node.name, error: errorMessage(error) }, 'syslog-ng check failed');
      return false;
    }
  }

  async findEligibleNodes(): Promise<{ eligible: PlatformNode[]; skipped: string[] }> {
    const eligible: PlatformNode[] = [];
    const skipped: string[] = [];

    for (const node of await this.client.listNodes(this.projectId)) {
      const verdict = checkEligibility(node, this.classification);
      if (verdict.eligible) {
        eligible.push(node);
      } else {
        skipped.push(verdict.reason);
      }
    }

    return { eligible, skipped };
  }

  async injectPromptCommand(snitchNodes: readonly SnitchNodeInfo[]): Promise<InjectionOutcome> {
    const { eligible, skipped } = await this.findEligibleNodes();
    const injected: string[] = [];
    const errors: string[] = [];

    for (const node of eligible) {
      try {
        const target = resolveConsoleTarget(node, this.options.consoleHost);
        if (!target) {
          skipped.push(`${node.name} (no console)`);
          continue;
        }

        const collector = selectCollector(node.name, snitchNodes, this.options.routing);
        const promptCommand = buildPromptCommand(collector.ipAddress, collector.port, this.options.logTag);

        await withConsole(this.connect, target, async session => {
          await this.settle(session);
          await session.runCommand(promptCommand, this.options.timings.probeReadMs);
          await session.runCommand(persistToBashrc(promptCommand), this.options.timings.probeReadMs);
        });

        injected.push(node.name);
        this.emit('injected', { name: node.name, collector: collector.name, collectorIp: collector.ipAddress });
        this.logger.info({ node: node.name, collectorIp: collector.ipAddress }, 'Audit hook injected');
      } catch (error) {
        const message = `Failed to inject into ${node.name}: ${errorMessage(error)}`;
        this.logger.error({ node: node.name }, message);
        errors.push(message);
      }
    }

    return { injected, skipped, errors };
  }

  async retrieveLogs(collector: CollectorHandle): Promise<string> {
    const target = resolveConsoleTarget(collector, this.options.consoleHost);
    if (!target) {
      throw new LookupError(`No console port for ${collector.name}`);
    }

    const output = await withConsole(this.connect, target, async session => {
      await this.settle(session);
      return session.runCommand(readLogCommand(this.options.logPath), this.options.timings.logReadMs);
    });
    return cleanLogOutput(output);
  }

  /** The student's collector nodes currently in the project. */
  async findStudentCollectors(studentName: string): Promise<PlatformNode[]> {
    const prefix = `${studentName}-`;
    const nodes = await this.client.listNodes(this.projectId);
    return nodes.filter(node => node.name.startsWith(prefix) && isCollectorName(node.name, this.classification));
  }

  async deleteCollectorNodes(studentName: string): Promise<DeletionOutcome> {
    const deleted: string[] = [];
    const errors: string[] = [];

    for (const node of await this.findStudentCollectors(studentName)) {
      try {
        if (await this.client.deleteNode(this.projectId, node.nodeId)) {
          deleted.push(node.name);
          this.logger.info({ node: node.name }, 'Collector deleted');
        } else {
          errors.push(`Failed to delete ${node.name}`);
        }
      } catch (error) {
        errors.push(`Failed to delete ${node.name}: ${errorMessage(error)}`);
      }
    }

    return { deleted, errors };
  }

  private async createCollectorNode(
    studentName: string,
    config: CollectorConfig
  ): Promise<{ node: PlatformNode; reused: boolean }> {
    const name = `${studentName}-${config.nameSuffix}`;
    const nodes = await this.client.listNodes(this.projectId);

    const existing = nodes.find(node => node.name === name);
    if (existing) {
      this.logger.info({ node: name }, 'Reusing existing collector node');
      return { node: existing, reused: true };
    }

    const switchNode = nodes.find(node => node.name === config.switchName);
    if (!switchNode) {
      throw new LookupError(`Switch '${config.switchName}' not found in project`);
    }

    const templateId = await this.resolveTemplateId();
    const node = await this.client.addNodeFromTemplate(this.projectId, templateId, {
      name,
      x: switchNode.x + this.options.placement.offsetX,
      y: switchNode.y + this.options.placement.offsetY,
    });
    this.logger.info({ node: name }, 'Created collector node');

    await this.connectToSwitch(node, switchNode);
    return { node, reused: false };
  }

  private async connectToSwitch(collector: PlatformNode, switchNode: PlatformNode): Promise<void> {
    const links = await this.client.listLinks(this.projectId);
    const adapter = findAvailableAdapter(links, switchNode, this.options.adapters);

    await this.client.createLink(
      this.projectId,
      { nodeId: collector.nodeId, adapterNumber: 0, portNumber: 0 },
      { nodeId: switchNode.nodeId, adapterNumber: adapter, portNumber: 0 }
    );
    this.logger.info({ node: collector.name, switch: switchNode.name, adapter }, 'Collector linked');
  }

  // Looked up on first use only, so reusing existing collectors needs no template
  private async resolveTemplateId(): Promise<string> {
    if (this.templateId) return this.templateId;

    const name = this.options.templateName;
    const template = (await this.client.listTemplates()).find(candidate => candidate.name === name);
    if (!template) {
      throw new LookupError(`Template '${name}' not found on the platform`);
    }

    this.templateId = template.templateId;
    return template.templateId;
  }

  // Let the console finish printing its banner, then discard it
  private async settle(session: IConsoleChannel): Promise<void> {
    await sleep(this.options.timings.consoleSettleMs);
    await session.read({ timeoutMs: this.options.timings.drainTimeoutMs });
  }
}
