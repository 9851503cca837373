import axios, { type AxiosInstance, type Method } from 'axios';
import pino, { type Logger } from 'pino';
import { z } from 'zod';
import {
  LookupError,
  PlatformApiError,
  errorMessage,
  type IPlatformClient,
  type LinkEndpoint,
  type PlatformLink,
  type PlatformNode,
  type PlatformProject,
  type PlatformTemplate,
} from '@labwright/core';
import {
  PlatformClientConfigSchema,
  RawLinkSchema,
  RawNodeSchema,
  RawProjectSchema,
  RawTemplateSchema,
  type PlatformClientConfigInput,
} from './schemas';

export interface PlatformClientOptions {
  config?: PlatformClientConfigInput;
  logger?: Logger;
}

export interface PurgeSummary {
  nodesDeleted: number;
  linksDeleted: number;
  errors: string[];
}

function toWireEndpoint(end: LinkEndpoint) {
  return { node_id: end.nodeId, adapter_number: end.adapterNumber, port_number: end.portNumber };
}

/**
 * Client for the platform's v2 REST API. Credentials, when configured, are
 * passed through as HTTP basic auth.
 */
export class PlatformClient implements IPlatformClient {
  private client: AxiosInstance;
  private logger: Logger;

  constructor(options: PlatformClientOptions = {}) {
    const config = PlatformClientConfigSchema.parse(options.config ?? {});
    this.logger = options.logger ?? pino({ name: 'platform-client' });

    this.client = axios.create({
      baseURL: config.baseUrl.replace(/\/+$/, ''),
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
      ...(config.username ? { auth: { username: config.username, password: config.password ?? '' } } : {}),
    });
  }

  async listProjects(): Promise<PlatformProject[]> {
    return this.request('GET', '/v2/projects', z.array(RawProjectSchema));
  }

  async findProjectId(projectName: string): Promise<string> {
    const project = (await this.listProjects()).find(candidate => candidate.name === projectName);
    if (!project) {
      throw new LookupError(`Project named '${projectName}' not found`);
    }
    return project.projectId;
  }

  /** Accepts a project id or name. */
  async resolveProjectId(nameOrId: string): Promise<string> {
    const projects = await this.listProjects();
    const project =
      projects.find(candidate => candidate.projectId === nameOrId) ??
      projects.find(candidate => candidate.name === nameOrId);
    if (!project) {
      throw new LookupError(`Project named '${nameOrId}' not found`);
    }
    return project.projectId;
  }

  async listTemplates(): Promise<PlatformTemplate[]> {
    return this.request('GET', '/v2/templates', z.array(RawTemplateSchema));
  }

  async findTemplateId(templateName: string): Promise<string> {
    const template = (await this.listTemplates()).find(candidate => candidate.name === templateName);
    if (!template) {
      throw new LookupError(`Template '${templateName}' not found`);
    }
    return template.templateId;
  }

  async listNodes(projectId: string): Promise<PlatformNode[]> {
    return this.request('GET', `/v2/projects/${projectId}/nodes`, z.array(RawNodeSchema));
  }

  async getNode(projectId: string, nodeId: string): Promise<PlatformNode> {
    return this.request('GET', `/v2/projects/${projectId}/nodes/${nodeId}`, RawNodeSchema);
  }

  async addNodeFromTemplate(
    projectId: string,
    templateId: string,
    placement: { name: string; x: number; y: number }
  ): Promise<PlatformNode> {
    const node = await this.request('POST', `/v2/projects/${projectId}/templates/${templateId}`, RawNodeSchema, {
      x: placement.x,
      y: placement.y,
      name: placement.name,
    });
    this.logger.info({ projectId, nodeId: node.nodeId, name: node.name }, 'Node created from template');
    return node;
  }

  async listLinks(projectId: string): Promise<PlatformLink[]> {
    return this.request('GET', `/v2/projects/${projectId}/links`, z.array(RawLinkSchema));
  }

  async createLink(projectId: string, a: LinkEndpoint, b: LinkEndpoint): Promise<PlatformLink> {
    return this.request('POST', `/v2/projects/${projectId}/links`, RawLinkSchema, {
      nodes: [toWireEndpoint(a), toWireEndpoint(b)],
    });
  }

  async startNode(projectId: string, nodeId: string): Promise<boolean> {
    return this.attempt('POST', `/v2/projects/${projectId}/nodes/${nodeId}/start`);
  }

  async stopAllNodes(projectId: string): Promise<boolean> {
    return this.attempt('POST', `/v2/projects/${projectId}/nodes/stop`);
  }

  async deleteNode(projectId: string, nodeId: string): Promise<boolean> {
    return this.attempt('DELETE', `/v2/projects/${projectId}/nodes/${nodeId}`);
  }

  async deleteLink(projectId: string, linkId: string): Promise<boolean> {
    return this.attempt('DELETE', `/v2/projects/${projectId}/links/${linkId}`);
  }

  /** Stops every node, then deletes every link and every node in the project. */
  async deleteAllNodes(projectId: string): Promise<PurgeSummary> {
    const summary: PurgeSummary = { nodesDeleted: 0, linksDeleted: 0, errors: [] };

    await this.stopAllNodes(projectId);

    try {
      for (const link of await this.listLinks(projectId)) {
        if (await this.deleteLink(projectId, link.linkId)) summary.linksDeleted++;
      }
    } catch (error) {
      summary.errors.push(`Failed to list/delete links: ${errorMessage(error)}`);
    }

    try {
      for (const node of await this.listNodes(projectId)) {
        if (await this.deleteNode(projectId, node.nodeId)) summary.nodesDeleted++;
      }
    } catch (error) {
      summary.errors.push(`Failed to list/delete nodes: ${errorMessage(error)}`);
    }

    this.logger.info({ projectId, ...summary }, 'Project purged');
    return summary;
  }

  private async request<S extends z.ZodTypeAny>(
    method: Method,
    path: string,
    schema: S,
    data?: unknown
  ): Promise<z.output<S>> {
    let body: unknown;
    let status: number;
    try {
      const response = await this.client.request<unknown>({
        method,
        url: path,
        data: data ?? (method === 'POST' ? {} : undefined),
      });
      body = response.data;
      status = response.status;
    } catch (error) {
      throw this.toApiError(method, path, error);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new PlatformApiError(method, path, status, `unexpected response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  // Fire-and-check calls: an HTTP error status is reported as false
  private async attempt(method: Method, path: string): Promise<boolean> {
    try {
      await this.client.request({ method, url: path, data: method === 'POST' ? {} : undefined });
      return true;
    } catch (error) {
      const apiError = this.toApiError(method, path, error);
      if (apiError.status === null) throw apiError;
      this.logger.warn({ method, path, status: apiError.status }, 'Platform request rejected');
      return false;
    }
  }

  private toApiError(method: Method, path: string, error: unknown): PlatformApiError {
    const upper = method.toUpperCase();
    if (axios.isAxiosError(error)) {
      const status = error.response?.status ?? null;
      return new PlatformApiError(upper, path, status, error.message, { cause: error });
    }
    return new PlatformApiError(upper, path, null, errorMessage(error), { cause: error });
  }
}
