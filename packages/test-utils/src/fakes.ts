/**
 * In-process stand-ins for the console layer, the platform API and the
 * record store.
 */

import {
  ConsoleClosedError,
  ConsoleConnectError,
  LookupError,
  type CommandStatus,
  type ConfigDocument,
  type ConsoleConnector,
  type ConsoleTarget,
  type IConfigStore,
  type IConsoleChannel,
  type IPlatformClient,
  type LinkEndpoint,
  type PlatformLink,
  type PlatformNode,
  type PlatformTemplate,
  type ReadForOptions,
  type ReadOptions,
  type StatusCommandOptions,
} from '@labwright/core';

/** A reply is text, or an error the console throws when the command is sent. */
export type ScriptedReply = string | Error;

export interface ConsoleScriptInput {
  /**
   * Replies keyed by command. A key matches the exact command first, then any
   * command that starts with it. Arrays are consumed in order; the last entry
   * repeats once the others are used up.
   */
  replies?: Record<string, ScriptedReply | ScriptedReply[]>;
  /** Exit codes reported by `runCommandWithStatus`. Unlisted commands exit 0. */
  exitCodes?: Record<string, number | null>;
}

/**
 * Reply state for one console. Shared by every session opened against it,
 * so a sequence keeps advancing across reconnects.
 */
export class ConsoleScript {
  readonly commands: string[] = [];
  private readonly replies = new Map<string, ScriptedReply[]>();
  private readonly exitCodes: Record<string, number | null>;

  constructor(input: ConsoleScriptInput = {}) {
    for (const [key, value] of Object.entries(input.replies ?? {})) {
      this.replies.set(key, Array.isArray(value) ? [...value] : [value]);
    }
    this.exitCodes = { ...(input.exitCodes ?? {}) };
  }

  reply(command: string): string {
    this.commands.push(command);

    const queue = this.lookup(this.replies, command);
    if (!queue || queue.length === 0) return '';

    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next instanceof Error) throw next;
    return next ?? '';
  }

  exitCode(command: string): number | null {
    const key = this.matchKey(Object.keys(this.exitCodes), command);
    return key === undefined ? 0 : this.exitCodes[key];
  }

  private lookup(map: Map<string, ScriptedReply[]>, command: string): ScriptedReply[] | undefined {
    const key = this.matchKey([...map.keys()], command);
    return key === undefined ? undefined : map.get(key);
  }

  private matchKey(keys: string[], command: string): string | undefined {
    return keys.find(key => key === command) ?? keys.find(key => command.startsWith(key));
  }
}

export class ScriptedConsole implements IConsoleChannel {
  closed = false;
  exitCommand: string | null | undefined;
  private pending = '';

  constructor(readonly target: ConsoleTarget, readonly script: ConsoleScript = new ConsoleScript()) {}

  async send(text: string, options: { newline?: boolean } = {}): Promise<void> {
    this.requireOpen();
    if (options.newline === false) {
      this.pending += text;
      return;
    }
    this.pending += this.script.reply(text);
  }

  async read(options: ReadOptions = {}): Promise<string> {
    this.requireOpen();
    const chunk = this.pending.slice(0, options.size ?? 1024);
    this.pending = this.pending.slice(chunk.length);
    return chunk;
  }

  async readFor(_durationMs: number, _options: ReadForOptions = {}): Promise<string> {
    this.requireOpen();
    const all = this.pending;
    this.pending = '';
    return all;
  }

  async runCommand(command: string, readDurationMs?: number): Promise<string> {
    await this.send(command);
    return this.readFor(readDurationMs ?? 0);
  }

  async runCommandWithStatus(command: string, _options: StatusCommandOptions = {}): Promise<CommandStatus> {
    const output = await this.runCommand(command);
    return { output, exitCode: this.script.exitCode(command) };
  }

  async close(exitCommand?: string | null): Promise<void> {
    this.closed = true;
    this.exitCommand = exitCommand;
  }

  private requireOpen(): void {
    if (this.closed) throw new ConsoleClosedError();
  }
}

/**
 * A set of scripted consoles keyed by port. `connect` is a drop-in
 * `ConsoleConnector`; ports without a script refuse the connection.
 */
export class ScriptedConsoleFarm {
  readonly dialed: ConsoleTarget[] = [];
  readonly sessions: ScriptedConsole[] = [];
  private readonly scripts = new Map<number, ConsoleScript>();

  script(port: number, input: ConsoleScriptInput = {}): ConsoleScript {
    const script = new ConsoleScript(input);
    this.scripts.set(port, script);
    return script;
  }

  commandsFor(port: number): string[] {
    return this.scripts.get(port)?.commands ?? [];
  }

  dialedPorts(): number[] {
    return this.dialed.map(target => target.port);
  }

  readonly connect: ConsoleConnector = async (target) => {
    this.dialed.push(target);
    const script = this.scripts.get(target.port);
    if (!script) {
      throw new ConsoleConnectError(target.host, target.port, 'connection refused');
    }
    const session = new ScriptedConsole(target, script);
    this.sessions.push(session);
    return session;
  };
}

export class MemoryConfigStore implements IConfigStore {
  writes = 0;
  backups = 0;
  readonly backupPath = '/memory/config.backup.json';
  private document: ConfigDocument;

  constructor(document: ConfigDocument) {
    this.document = structuredClone(document);
  }

  get current(): ConfigDocument {
    return structuredClone(this.document);
  }

  async load(): Promise<ConfigDocument> {
    return structuredClone(this.document);
  }

  async write(document: ConfigDocument): Promise<void> {
    this.writes += 1;
    this.document = structuredClone(document);
  }

  async backup(): Promise<string> {
    this.backups += 1;
    return this.backupPath;
  }
}

export interface FakePlatformOptions {
  templates?: PlatformTemplate[];
  nodes?: PlatformNode[];
  links?: PlatformLink[];
  consoleHost?: string;
}

/**
 * In-memory platform for one or more projects. New nodes get console ports
 * counting up from 5100.
 */
export class FakePlatformClient implements IPlatformClient {
  readonly created: PlatformNode[] = [];
  readonly started: string[] = [];
  readonly deleted: string[] = [];
  readonly linked: Array<[LinkEndpoint, LinkEndpoint]> = [];
  /** Node ids whose start request reports failure. */
  readonly failStart = new Set<string>();
  /** Node ids whose delete request reports failure. */
  readonly failDelete = new Set<string>();
  templateCalls = 0;

  private readonly templates: PlatformTemplate[];
  private readonly nodes: PlatformNode[];
  private readonly links: PlatformLink[];
  private readonly consoleHost: string;
  private nextConsolePort = 5100;
  private sequence = 0;

  constructor(options: FakePlatformOptions = {}) {
    this.templates = options.templates ?? [{ templateId: 't-syslog', name: 'syslog-collector' }];
    this.nodes = [...(options.nodes ?? [])];
    this.links = [...(options.links ?? [])];
    this.consoleHost = options.consoleHost ?? '192.168.56.10';
  }

  async listTemplates(): Promise<PlatformTemplate[]> {
    this.templateCalls += 1;
    return [...this.templates];
  }

  async listNodes(_projectId: string): Promise<PlatformNode[]> {
    return this.nodes.map(node => ({ ...node }));
  }

  async getNode(_projectId: string, nodeId: string): Promise<PlatformNode> {
    const node = this.nodes.find(candidate => candidate.nodeId === nodeId);
    if (!node) throw new LookupError(`Node '${nodeId}' not found`);
    return { ...node };
  }

  async addNodeFromTemplate(
    _projectId: string,
    templateId: string,
    placement: { name: string; x: number; y: number }
  ): Promise<PlatformNode> {
    if (!this.templates.some(template => template.templateId === templateId)) {
      throw new LookupError(`Template '${templateId}' not found`);
    }

    this.sequence += 1;
    const node: PlatformNode = {
      nodeId: `node-${this.sequence}`,
      name: placement.name,
      consolePort: this.nextConsolePort++,
      consoleHost: this.consoleHost,
      consoleType: 'telnet',
      status: 'stopped',
      x: placement.x,
      y: placement.y,
    };
    this.nodes.push(node);
    this.created.push({ ...node });
    return { ...node };
  }

  async listLinks(_projectId: string): Promise<PlatformLink[]> {
    return this.links.map(link => ({ ...link, nodes: link.nodes.map(end => ({ ...end })) }));
  }

  async createLink(_projectId: string, a: LinkEndpoint, b: LinkEndpoint): Promise<PlatformLink> {
    this.sequence += 1;
    const link: PlatformLink = { linkId: `link-${this.sequence}`, nodes: [{ ...a }, { ...b }] };
    this.links.push(link);
    this.linked.push([a, b]);
    return link;
  }

  async startNode(_projectId: string, nodeId: string): Promise<boolean> {
    this.started.push(nodeId);
    if (this.failStart.has(nodeId)) return false;
    const node = this.nodes.find(candidate => candidate.nodeId === nodeId);
    if (node) node.status = 'started';
    return true;
  }

  async deleteNode(_projectId: string, nodeId: string): Promise<boolean> {
    if (this.failDelete.has(nodeId)) return false;
    const index = this.nodes.findIndex(candidate => candidate.nodeId === nodeId);
    if (index === -1) return false;
    this.nodes.splice(index, 1);
    this.deleted.push(nodeId);
    return true;
  }
}
