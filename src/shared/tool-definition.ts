/**
 * Tool definition helpers shared by every handler module.
 */

import { z } from 'zod';
import type { MonitoringApi } from '../aws/monitoring-api.js';
import type { AppConfig } from '../config/config-loader.js';
import type { Logger } from '../observability/index.js';
import { Errors, type McpError } from './errors.js';

/**
 * Everything a handler needs besides its parameters.
 * `now` and `sleep` are injectable so composite tools and polling are deterministic under test.
 */
export interface ToolContext {
  api: MonitoringApi;
  config: AppConfig;
  logger: Logger;
  now: () => Date;
  sleep: (ms: number) => Promise<void>;
}

/**
 * Text reports go back verbatim; structured results are serialized as JSON by the server.
 */
export type ToolOutput = string | Record<string, unknown>;

export interface ToolDefinition<S extends z.ZodRawShape> {
  name: string;
  title: string;
  description: string;
  inputSchema: S;
  run: (params: z.infer<z.ZodObject<S>>, context: ToolContext) => Promise<ToolOutput>;
}

/**
 * Type-erased tool as stored in the registry: parameters are validated inside `invoke`.
 */
export interface RegisteredTool {
  name: string;
  title: string;
  description: string;
  inputSchema: z.ZodRawShape;
  invoke: (rawParams: unknown, context: ToolContext) => Promise<ToolOutput>;
}

export function defineTool<S extends z.ZodRawShape>(definition: ToolDefinition<S>): RegisteredTool {
  const schema = z.object(definition.inputSchema);

  return {
    name: definition.name,
    title: definition.title,
    description: definition.description,
    inputSchema: definition.inputSchema,
    invoke: async (rawParams, context) => {
      const parsed = schema.safeParse(rawParams ?? {});
      if (!parsed.success) {
        throw toParameterError(parsed.error, rawParams);
      }
      return definition.run(parsed.data, context);
    },
  };
}

function toParameterError(error: z.ZodError, rawParams: unknown): McpError {
  const issue = error.issues[0];
  if (!issue) {
    return Errors.parameterInvalid('params', rawParams, 'an object of tool parameters');
  }

  const parameter = issue.path.length > 0 ? issue.path.join('.') : 'params';
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return Errors.parameterMissing(parameter, issue.expected);
  }
  return Errors.parameterInvalid(parameter, readParam(rawParams, issue.path), issue.message);
}

function readParam(rawParams: unknown, path: (string | number)[]): unknown {
  let current: unknown = rawParams;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Shared parameter shapes
 */
export const includeLinkedAccountsParam = z
  .boolean()
  .default(true)
  .describe('Whether to include services from linked AWS accounts (default: true)');

export const requiredText = (description: string) =>
  z.string().trim().min(1).describe(description);
