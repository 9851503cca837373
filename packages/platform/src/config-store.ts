import { promises as fs } from 'fs';
import * as path from 'path';
import pino, { type Logger } from 'pino';
import {
  ConfigDocument,
  ConfigFormatError,
  NodeRecord,
  errorMessage,
  type IConfigStore,
} from '@labwright/core';

export const DEFAULT_BACKUP_SUFFIX = '.backup.json';

// Generated config files use the platform's snake_case keys
const DOCUMENT_KEYS_ON_DISK: Record<string, string> = {
  projectName: 'project_name',
  projectId: 'project_id',
};

const NODE_KEYS_ON_DISK: Record<string, string> = {
  nodeId: 'node_id',
  consolePort: 'console',
  consoleHost: 'console_host',
  consoleType: 'console_type',
  assignedIp: 'assigned_ip',
};

function invert(keys: Record<string, string>, aliases: Record<string, string> = {}): Record<string, string> {
  const inverted: Record<string, string> = { ...aliases };
  for (const [model, disk] of Object.entries(keys)) inverted[disk] = model;
  return inverted;
}

const DOCUMENT_KEYS_IN_MODEL = invert(DOCUMENT_KEYS_ON_DISK);
const NODE_KEYS_IN_MODEL = invert(NODE_KEYS_ON_DISK, { console_port: 'consolePort' });

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Renames known keys and keeps the rest in order; the first of two aliases wins
function renameKeys(source: JsonObject, keys: Record<string, string>): JsonObject {
  const renamed: JsonObject = {};
  for (const [key, value] of Object.entries(source)) {
    const target = keys[key] ?? key;
    if (!(target in renamed)) renamed[target] = value;
  }
  return renamed;
}

/** On-disk document to the camelCase model. Entries that are not objects are kept as they are. */
export function fromDiskDocument(data: JsonObject): JsonObject {
  const document = renameKeys(data, DOCUMENT_KEYS_IN_MODEL);
  if (Array.isArray(document.nodes)) {
    document.nodes = document.nodes.map((entry: unknown) =>
      isObject(entry) ? renameKeys(entry, NODE_KEYS_IN_MODEL) : entry
    );
  }
  return document;
}

export function toDiskDocument(document: ConfigDocument): JsonObject {
  const data = renameKeys(document, DOCUMENT_KEYS_ON_DISK);
  data.nodes = document.nodes.map(entry => (isObject(entry) ? renameKeys(entry, NODE_KEYS_ON_DISK) : entry));
  return data;
}

export interface JsonConfigStoreOptions {
  /** Returned by `load()` when the file does not exist yet. */
  defaultDocument?: ConfigDocument;
  logger?: Logger;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * The generated node record file. Records are camelCase in memory and keep
 * the platform's snake_case keys on disk. Writes go to a temp file in the
 * same directory and are renamed over the target.
 */
export class JsonConfigStore implements IConfigStore {
  readonly path: string;
  private logger: Logger;
  private defaultDocument?: ConfigDocument;

  constructor(filePath: string, options: JsonConfigStoreOptions = {}) {
    this.path = path.resolve(filePath);
    this.logger = options.logger ?? pino({ name: 'config-store' });
    this.defaultDocument = options.defaultDocument;
  }

  async load(): Promise<ConfigDocument> {
    let text: string;
    try {
      text = await fs.readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissing(error) && this.defaultDocument) {
        return structuredClone(this.defaultDocument);
      }
      throw new ConfigFormatError(`Cannot read config file ${this.path}: ${errorMessage(error)}`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ConfigFormatError(`Config file ${this.path} is not valid JSON`, { cause: error });
    }

    if (!isObject(data)) {
      throw new ConfigFormatError('Config file must contain a JSON object');
    }

    const parsed = ConfigDocument.safeParse(fromDiskDocument(data));
    if (!parsed.success) {
      throw new ConfigFormatError("Config file must contain a 'nodes' array", { cause: parsed.error });
    }
    return parsed.data;
  }

  async write(document: ConfigDocument): Promise<void> {
    const directory = path.dirname(this.path);
    await fs.mkdir(directory, { recursive: true });

    const temp = path.join(directory, `.${path.basename(this.path)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await fs.writeFile(temp, `${JSON.stringify(toDiskDocument(document), null, 4)}\n`, 'utf8');
      await fs.rename(temp, this.path);
    } finally {
      await fs.rm(temp, { force: true });
    }

    this.logger.debug({ path: this.path }, 'Config written');
  }

  /**
   * Copies the current file beside itself, `config.json` becoming
   * `config.backup.json`. A missing source is not an error.
   */
  async backup(suffix: string = DEFAULT_BACKUP_SUFFIX): Promise<string> {
    const extension = path.extname(this.path);
    const backupPath = (extension ? this.path.slice(0, -extension.length) : this.path) + suffix;

    try {
      await fs.copyFile(this.path, backupPath);
    } catch (error) {
      if (!isMissing(error)) throw error;
      this.logger.debug({ path: this.path }, 'Nothing to back up');
    }
    return backupPath;
  }
}

/** Entries of `nodes` that are well-formed node records. */
export function listNodeRecords(document: ConfigDocument): NodeRecord[] {
  const records: NodeRecord[] = [];
  for (const entry of document.nodes) {
    const parsed = NodeRecord.safeParse(entry);
    if (parsed.success) records.push(parsed.data);
  }
  return records;
}

export function findNodeByName(document: ConfigDocument, name: string): NodeRecord | undefined {
  const wanted = name.toLowerCase();
  return listNodeRecords(document).find(record => record.name.toLowerCase() === wanted);
}
