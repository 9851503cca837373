import pino, { type Logger } from 'pino';
import { LookupError, type ConsoleConnector } from '@labwright/core';
import { createConnector } from '@labwright/console';
import { DhcpOrchestrator } from '@labwright/dhcp';
import { LogCollector } from '@labwright/log-collector';
import { JsonConfigStore, PlatformClient } from '@labwright/platform';
import type { LabwrightConfig } from './config';

export function createLogger(config: Pick<LabwrightConfig, 'logLevel'>, pretty = true): Logger {
  return pino({
    level: config.logLevel,
    ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
  });
}

export interface LabwrightServices {
  config: LabwrightConfig;
  logger: Logger;
  platform: PlatformClient;
  store: JsonConfigStore;
  connect: ConsoleConnector;
}

export function createServices(config: LabwrightConfig, logger: Logger): LabwrightServices {
  return {
    config,
    logger,
    platform: new PlatformClient({ config: config.platform, logger: logger.child({ name: 'platform-client' }) }),
    store: new JsonConfigStore(config.recordsPath, { logger: logger.child({ name: 'config-store' }) }),
    connect: createConnector({ settings: config.console, logger: logger.child({ name: 'console' }) }),
  };
}

export function createDhcpOrchestrator(services: LabwrightServices): DhcpOrchestrator {
  const { config } = services;
  return new DhcpOrchestrator(services.store, {
    connect: services.connect,
    classification: config.classification,
    options: { ...config.dhcp, consoleHost: config.consoleHost },
    logger: services.logger.child({ name: 'dhcp-orchestrator' }),
  });
}

export async function resolveProjectId(services: LabwrightServices): Promise<string> {
  const project = services.config.project;
  if (!project) {
    throw new LookupError('No project configured; pass --project or set LABWRIGHT_PROJECT');
  }
  return services.platform.resolveProjectId(project);
}

export async function createLogCollector(
  services: LabwrightServices,
  templateName?: string
): Promise<LogCollector> {
  const { config } = services;
  const projectId = await resolveProjectId(services);
  return new LogCollector(services.platform, projectId, {
    connect: services.connect,
    classification: config.classification,
    options: {
      ...config.logCollector,
      templateName: templateName ?? config.logCollector.templateName,
      consoleHost: config.consoleHost,
    },
    logger: services.logger.child({ name: 'log-collector' }),
  });
}
