import type {
  CommandStatus,
  ConfigDocument,
  ConsoleTarget,
  LinkEndpoint,
  PlatformLink,
  PlatformNode,
  PlatformTemplate,
} from './types';

export interface ReadOptions {
  size?: number;
  timeoutMs?: number;
}

export interface ReadForOptions {
  size?: number;
  pollIntervalMs?: number;
}

export interface StatusCommandOptions {
  readDurationMs?: number;
  sentinel?: string;
}

/**
 * One open console on one node. Commands run in send order and their output
 * is read back in the same order.
 */
export interface IConsoleChannel {
  send(text: string, options?: { newline?: boolean }): Promise<void>;
  read(options?: ReadOptions): Promise<string>;
  readFor(durationMs: number, options?: ReadForOptions): Promise<string>;
  runCommand(command: string, readDurationMs?: number): Promise<string>;
  runCommandWithStatus(command: string, options?: StatusCommandOptions): Promise<CommandStatus>;
  /** Never rejects. */
  close(exitCommand?: string | null): Promise<void>;
}

/** Opens a connected console for a target. Rejects when the connection fails. */
export type ConsoleConnector = (target: ConsoleTarget) => Promise<IConsoleChannel>;

export interface IConfigStore {
  load(): Promise<ConfigDocument>;
  write(document: ConfigDocument): Promise<void>;
  backup(): Promise<string>;
}

export interface IPlatformClient {
  listTemplates(): Promise<PlatformTemplate[]>;
  listNodes(projectId: string): Promise<PlatformNode[]>;
  getNode(projectId: string, nodeId: string): Promise<PlatformNode>;
  addNodeFromTemplate(
    projectId: string,
    templateId: string,
    placement: { name: string; x: number; y: number }
  ): Promise<PlatformNode>;
  listLinks(projectId: string): Promise<PlatformLink[]>;
  createLink(projectId: string, a: LinkEndpoint, b: LinkEndpoint): Promise<PlatformLink>;
  startNode(projectId: string, nodeId: string): Promise<boolean>;
  deleteNode(projectId: string, nodeId: string): Promise<boolean>;
}
