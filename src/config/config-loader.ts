import { promises as fs } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { Errors, type ErrorEnvelope } from '../shared/errors.js';
import { resolveLogLevel, type LogLevel } from '../observability/logger.js';

export const DEFAULT_CONFIG_FILENAME = 'appsignals.config.yaml';

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  region: z.string().min(1),
  profile: z.string().min(1).optional(),
  logLevel: z.string().transform((value) => resolveLogLevel(value)),
  maxAttempts: positiveInt.max(10),
  maxServices: positiveInt.max(1000),
  maxSlosPerService: positiveInt.max(500),
  maxTraces: positiveInt.max(1000),
  serviceLookbackHours: positiveInt.max(24 * 14),
  defaultTraceWindowHours: positiveInt.max(24),
  maxTraceWindowHours: positiveInt.max(24),
  transactionSpansLogGroup: z.string().min(1),
  queryPollIntervalMs: positiveInt.max(60_000),
  healthCheckTraceSample: positiveInt.max(100),
});

export interface AppConfig {
  region: string;
  profile?: string;
  logLevel: LogLevel;
  maxAttempts: number;
  maxServices: number;
  maxSlosPerService: number;
  maxTraces: number;
  serviceLookbackHours: number;
  defaultTraceWindowHours: number;
  maxTraceWindowHours: number;
  transactionSpansLogGroup: string;
  queryPollIntervalMs: number;
  healthCheckTraceSample: number;
}

export interface LoadedConfig {
  config: AppConfig;
  source: 'file' | 'default';
  path: string;
  warnings: ErrorEnvelope[];
}

export const DEFAULT_CONFIG: AppConfig = {
  region: 'us-east-1',
  logLevel: 'info',
  maxAttempts: 3,
  maxServices: 100,
  maxSlosPerService: 100,
  maxTraces: 100,
  serviceLookbackHours: 24,
  defaultTraceWindowHours: 3,
  maxTraceWindowHours: 6,
  transactionSpansLogGroup: 'aws/spans',
  queryPollIntervalMs: 1000,
  healthCheckTraceSample: 5,
};

export interface LoadConfigOptions {
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
}


/**
 * Resolve configuration: defaults, then the YAML file, then environment variables.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const baseDir = options.baseDir ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = path.resolve(baseDir, env.APPSIGNALS_CONFIG ?? DEFAULT_CONFIG_FILENAME);

  let fileValues: Record<string, unknown> = {};
  let source: LoadedConfig['source'] = 'file';
  const warnings: ErrorEnvelope[] = [];

  try {
    const content = await fs.readFile(configPath, 'utf8');
    fileValues = parseConfigDocument(content, configPath);
  } catch (error) {
    if (isMissingFile(error)) {
      source = 'default';
      warnings.push(Errors.configNotFound(configPath).toEnvelope());
    } else {
      throw error;
    }
  }

  const merged = {
    ...DEFAULT_CONFIG,
    ...fileValues,
    ...readEnvOverrides(env),
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'config';
    const reason = issue ? issue.message : 'validation failed';
    throw Errors.configInvalid(`${field}: ${reason}`, configPath);
  }

  return {
    config: parsed.data,
    source,
    path: configPath,
    warnings,
  };
}

function parseConfigDocument(content: string, configPath: string): Record<string, unknown> {
  let document: unknown;
  try {
    document = YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw Errors.configInvalid(`failed to parse ${configPath}: ${reason}`, configPath);
  }

  if (document === null || document === undefined) {
    return {};
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw Errors.configInvalid('top-level value must be a mapping', configPath);
  }
  return { ...document };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<Record<keyof AppConfig, string>> {
  const overrides: Partial<Record<keyof AppConfig, string>> = {};

  const region = env.AWS_REGION ?? env.AWS_DEFAULT_REGION;
  if (region) overrides.region = region;
  if (env.AWS_PROFILE) overrides.profile = env.AWS_PROFILE;

  const logLevel = env.MCP_APPSIGNALS_LOG_LEVEL ?? env.LOG_LEVEL;
  if (logLevel) overrides.logLevel = logLevel;

  if (env.APPSIGNALS_MAX_ATTEMPTS) overrides.maxAttempts = env.APPSIGNALS_MAX_ATTEMPTS;
  if (env.APPSIGNALS_MAX_SERVICES) overrides.maxServices = env.APPSIGNALS_MAX_SERVICES;
  if (env.APPSIGNALS_MAX_TRACES) overrides.maxTraces = env.APPSIGNALS_MAX_TRACES;

  return overrides;
}
