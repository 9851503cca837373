import { errorMessage, type CollectorConfig, type SnitchNodeInfo } from '@labwright/core';
import type { LogCollector } from './collector';
import { zoneKey, type CollectorHandle } from './routing';

export const NO_COLLECTORS_MESSAGE =
  'No collectors could be deployed. Ensure DHCP server is running or assign static IPs.';

export interface LogCollectorResult {
  snitchNodes: SnitchNodeInfo[];
  injectedNodes: string[];
  skippedNodes: string[];
  errors: string[];
  reusedExisting: boolean;
}

export interface StudentLoggingOptions {
  itSwitchName?: string;
  otSwitchName?: string;
}

export interface RetrievedLogs {
  logs: Record<string, string>;
  errors: string[];
}

export function defaultCollectors(options: StudentLoggingOptions = {}): CollectorConfig[] {
  return [
    { nameSuffix: 'IT-Collector', switchName: options.itSwitchName ?? 'IT-Switch' },
    { nameSuffix: 'OT-Collector', switchName: options.otSwitchName ?? 'OT-Switch' },
  ];
}

/**
 * Deploys the IT and OT collectors for a student and injects the audit hook
 * into every eligible node. The DHCP server should already be running.
 */
export async function setupLoggingForStudent(
  collector: LogCollector,
  studentName: string,
  options: StudentLoggingOptions = {}
): Promise<LogCollectorResult> {
  const setup = await collector.setupCollectors(studentName, defaultCollectors(options));

  if (setup.snitchNodes.length === 0) {
    return {
      snitchNodes: [],
      injectedNodes: [],
      skippedNodes: [],
      errors: setup.errors.length > 0 ? setup.errors : [NO_COLLECTORS_MESSAGE],
      reusedExisting: setup.reusedExisting,
    };
  }

  const injection = await collector.injectPromptCommand(setup.snitchNodes);

  return {
    snitchNodes: setup.snitchNodes,
    injectedNodes: injection.injected,
    skippedNodes: injection.skipped,
    errors: [...setup.errors, ...injection.errors],
    reusedExisting: setup.reusedExisting,
  };
}

export async function retrieveAllLogs(
  collector: LogCollector,
  collectors: readonly CollectorHandle[]
): Promise<RetrievedLogs> {
  const logs: Record<string, string> = {};
  const errors: string[] = [];

  for (const handle of collectors) {
    const key = zoneKey(handle.name, collector.routing);
    try {
      logs[key] = await collector.retrieveLogs(handle);
      if (!logs[key].trim()) {
        errors.push(`${handle.name}: Log file is empty - commands may not be reaching the collector`);
      }
    } catch (error) {
      errors.push(`Failed to retrieve logs from ${handle.name}: ${errorMessage(error)}`);
      logs[key] = '';
    }
  }

  return { logs, errors };
}

export function teardownLoggingForStudent(collector: LogCollector, studentName: string) {
  return collector.deleteCollectorNodes(studentName);
}
