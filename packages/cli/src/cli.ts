#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import pino from 'pino';
import { CommandFailedError, LookupError, errorMessage } from '@labwright/core';
import { resolveConsoleTarget, runCheckedCommand } from '@labwright/console';
import {
  retrieveAllLogs,
  setupLoggingForStudent,
  teardownLoggingForStudent,
  type CollectorHandle,
} from '@labwright/log-collector';
import { findNodeByName } from '@labwright/platform';
import { loadConfig } from './config';
import {
  createDhcpOrchestrator,
  createLogCollector,
  createLogger,
  createServices,
  resolveProjectId,
  type LabwrightServices,
} from './factory';

const logger = pino({
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
    },
  },
});

interface GlobalOptions {
  config?: string;
  project?: string;
  platformUrl?: string;
  records?: string;
  consoleHost?: string;
  logLevel?: string;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return Math.round(seconds * 1000);
}

async function bootstrap(command: Command): Promise<LabwrightServices> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = await loadConfig({
    file: options.config,
    overrides: {
      project: options.project,
      recordsPath: options.records,
      consoleHost: options.consoleHost,
      logLevel: options.logLevel,
      platform: { baseUrl: options.platformUrl },
    },
  });
  return createServices(config, createLogger(config));
}

// Failures are reported once here and turn into a non-zero exit status
function guarded<A extends unknown[]>(fn: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      logger.error({ code: error instanceof Error && 'code' in error ? error.code : undefined }, errorMessage(error));
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('labwright')
  .description('Console automation and node provisioning for emulated network labs')
  .version('0.1.0')
  .option('-c, --config <file>', 'Load configuration from file')
  .option('-p, --project <nameOrId>', 'Platform project name or id (or LABWRIGHT_PROJECT)')
  .option('--platform-url <url>', 'Platform API base URL (or LABWRIGHT_PLATFORM_URL)')
  .option('--records <path>', 'Generated node record file (or LABWRIGHT_RECORDS_PATH)')
  .option('--console-host <host>', 'Dial every console on this host instead of the recorded one')
  .option('--log-level <level>', 'fatal, error, warn, info, debug, trace or silent');

const dhcp = program.command('dhcp').description('DHCP address assignment');

dhcp
  .command('assign')
  .description('Start DHCP servers, lease addresses on clients and record them')
  .option('--dhclient-timeout <seconds>', 'How long to read dhclient output', parseSeconds)
  .option('--warmup <seconds>', 'Pause between starting servers and leasing', parseSeconds)
  .action(
    guarded(async (options: { dhclientTimeout?: number; warmup?: number }, command: Command) => {
      const services = await bootstrap(command);
      const result = await createDhcpOrchestrator(services).assign({
        dhclientTimeoutMs: options.dhclientTimeout,
        warmupMs: options.warmup,
      });

      const outcomes = [...result.serverResults, ...result.clientResults];
      for (const outcome of outcomes) {
        services.logger.info(
          { node: outcome.name, action: outcome.action, success: outcome.success, assignedIp: outcome.assignedIp },
          outcome.error ?? (outcome.output === 'skipped' ? 'skipped' : 'ok')
        );
      }

      const failed = outcomes.filter(outcome => !outcome.success).length;
      services.logger.info(
        { nodes: outcomes.length, failed, changedNodes: result.changedNodes, backupPath: result.backupPath },
        result.changed ? 'Address assignment saved' : 'Address assignment unchanged'
      );
    })
  );

const logging = program.command('logging').description('Student command logging');

logging
  .command('setup <student>')
  .description('Deploy IT/OT collectors for a student and inject the audit hook')
  .option('--it-switch <name>', 'Switch for the IT collector', 'IT-Switch')
  .option('--ot-switch <name>', 'Switch for the OT collector', 'OT-Switch')
  .option('--template <name>', 'Collector template name')
  .action(
    guarded(
      async (student: string, options: { itSwitch: string; otSwitch: string; template?: string }, command: Command) => {
        const services = await bootstrap(command);
        const collector = await createLogCollector(services, options.template);
        const result = await setupLoggingForStudent(collector, student, {
          itSwitchName: options.itSwitch,
          otSwitchName: options.otSwitch,
        });

        for (const node of result.snitchNodes) {
          services.logger.info({ node: node.name, ipAddress: node.ipAddress, switch: node.connectedToSwitch }, 'Collector');
        }
        for (const message of result.errors) {
          services.logger.warn(message);
        }
        services.logger.info(
          { injected: result.injectedNodes, skipped: result.skippedNodes, reusedExisting: result.reusedExisting },
          'Logging setup finished'
        );

        if (result.snitchNodes.length === 0) {
          process.exitCode = 1;
        }
      }
    )
  );

logging
  .command('logs <student>')
  .description("Print the logs held by a student's collectors")
  .action(
    guarded(async (student: string, _options: unknown, command: Command) => {
      const services = await bootstrap(command);
      const collector = await createLogCollector(services);

      const handles: CollectorHandle[] = await collector.findStudentCollectors(student);
      if (handles.length === 0) {
        throw new LookupError(`No collectors found for ${student}`);
      }

      const { logs, errors } = await retrieveAllLogs(collector, handles);
      for (const [zone, text] of Object.entries(logs)) {
        process.stdout.write(`==== ${zone} ====\n${text}\n`);
      }
      for (const message of errors) {
        services.logger.warn(message);
      }
    })
  );

logging
  .command('teardown <student>')
  .description("Delete a student's collector nodes")
  .action(
    guarded(async (student: string, _options: unknown, command: Command) => {
      const services = await bootstrap(command);
      const { deleted, errors } = await teardownLoggingForStudent(await createLogCollector(services), student);

      for (const message of errors) {
        services.logger.warn(message);
      }
      services.logger.info({ deleted }, 'Collectors removed');
      if (errors.length > 0) {
        process.exitCode = 1;
      }
    })
  );

const consoleCommand = program.command('console').description('Node console access');

consoleCommand
  .command('exec <node> <command>')
  .description('Run a shell command on a node console and print its output')
  .option('--timeout <seconds>', 'How long to read output', parseSeconds)
  .action(
    guarded(async (nodeName: string, shellCommand: string, options: { timeout?: number }, command: Command) => {
      const services = await bootstrap(command);
      const record = findNodeByName(await services.store.load(), nodeName);
      if (!record) {
        throw new LookupError(`Node '${nodeName}' not found in ${services.store.path}`);
      }

      const target = resolveConsoleTarget(record, services.config.consoleHost);
      if (!target) {
        throw new LookupError(`Node '${record.name}' has no console port`);
      }

      try {
        const status = await runCheckedCommand(services.connect, target, shellCommand, {
          readDurationMs: options.timeout,
        });
        process.stdout.write(status.output);
      } catch (error) {
        if (!(error instanceof CommandFailedError)) throw error;
        process.stdout.write(error.output);
        services.logger.error({ exitCode: error.exitCode }, error.message);
        process.exitCode = 1;
      }
    })
  );

const nodes = program.command('nodes').description('Project node maintenance');

nodes
  .command('purge')
  .description('Delete every link and node in the project')
  .action(
    guarded(async (_options: unknown, command: Command) => {
      const services = await bootstrap(command);
      const projectId = await resolveProjectId(services);
      const summary = await services.platform.deleteAllNodes(projectId);

      for (const message of summary.errors) {
        services.logger.warn(message);
      }
      services.logger.info({ nodes: summary.nodesDeleted, links: summary.linksDeleted }, 'Project purged');
      if (summary.errors.length > 0) {
        process.exitCode = 1;
      }
    })
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exitCode = 1;
});
