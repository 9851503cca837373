import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ClassificationPolicySchema, ConfigFormatError, errorMessage } from '@labwright/core';
import { ConsoleSettingsSchema } from '@labwright/console';
import { DhcpOptionsSchema } from '@labwright/dhcp';
import { LogCollectorOptionsSchema } from '@labwright/log-collector';
import { PlatformClientConfigSchema } from '@labwright/platform';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const LabwrightConfigSchema = z.object({
  // Project name or id on the platform
  project: z.string().min(1).optional(),
  recordsPath: z.string().min(1).default('./config/config.generated.json'),
  consoleHost: z.string().nullable().default(null),
  logLevel: LogLevelSchema.default('info'),
  platform: PlatformClientConfigSchema.default({}),
  console: ConsoleSettingsSchema.default({}),
  classification: ClassificationPolicySchema.default({}),
  dhcp: DhcpOptionsSchema.omit({ consoleHost: true }).default({}),
  logCollector: LogCollectorOptionsSchema.omit({ consoleHost: true }).default({}),
});

export type LabwrightConfig = z.infer<typeof LabwrightConfigSchema>;

/** One source of settings; later layers win, undefined values are ignored. */
export type ConfigLayer = Record<string, unknown>;

export const ENV_PREFIX = 'LABWRIGHT_';

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = merged[key];
      merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
    }
  }
  return merged;
}

export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const read = (name: string) => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  return {
    project: read('PROJECT'),
    recordsPath: read('RECORDS_PATH'),
    consoleHost: read('CONSOLE_HOST'),
    logLevel: read('LOG_LEVEL'),
    platform: {
      baseUrl: read('PLATFORM_URL'),
      username: read('PLATFORM_USER'),
      password: read('PLATFORM_PASSWORD'),
    },
  };
}

export async function readConfigFile(file: string): Promise<ConfigLayer> {
  const resolved = path.resolve(file);
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigFormatError(`Cannot load config file ${resolved}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isPlainObject(data)) {
    throw new ConfigFormatError(`Config file ${resolved} must contain a JSON object`);
  }
  return data;
}

export interface LoadConfigOptions {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
}

/**
 * Schema defaults, then the config file, then LABWRIGHT_* variables, then
 * command-line overrides.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LabwrightConfig> {
  const fileLayer = options.file ? await readConfigFile(options.file) : {};
  const merged = mergeLayers(fileLayer, envLayer(options.env ?? process.env), options.overrides ?? {});

  const parsed = LabwrightConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigFormatError(`Invalid configuration: ${issues.join('; ')}`, { cause: parsed.error });
  }
  return parsed.data;
}
