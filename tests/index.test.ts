import { describe, it, expect, beforeEach } from 'vitest';
import {
  TOOL_NAMES,
  dispatchTool,
  getRegisteredTools,
  getTool,
  toCallToolResult,
} from '../src/index.js';
import { metrics } from '../src/observability/index.js';
import { ErrorCode, createSuccess, isError, isSuccess } from '../src/shared/errors.js';
import { createTestContext, service, totalCalls } from './helpers/fake-monitoring-api.js';

beforeEach(() => {
  metrics.reset();
});

describe('Tool registry', () => {
  it('registers every tool in order', () => {
    expect(getRegisteredTools().map((tool) => tool.name)).toEqual([...TOOL_NAMES]);
  });

  it('uses MCP-safe tool names with a title and description', () => {
    for (const tool of getRegisteredTools()) {
      expect(tool.name).toMatch(/^[a-zA-Z0-9_-]+$/);
      expect(tool.title.length).toBeGreaterThan(0);
      expect(tool.description.length).toBeGreaterThan(0);
      expect(getTool(tool.name)?.name).toBe(tool.name);
    }
  });

  it('should return undefined for unregistered tools', () => {
    expect(getTool('nonexistent_tool')).toBeUndefined();
  });
});

describe('dispatchTool', () => {
  it('returns UNKNOWN_TOOL without calling AWS', async () => {
    const { api, context } = createTestContext();

    const result = await dispatchTool('delete_everything', {}, context);

    expect(isError(result)).toBe(true);
    if (isError(result)) {
      expect(result.error.code).toBe(ErrorCode.UNKNOWN_TOOL);
      expect(result.error.message).toBe('Unknown tool "delete_everything"');
      expect(result.error.details?.availableTools).toEqual([...TOOL_NAMES]);
    }
    expect(totalCalls(api)).toBe(0);
  });

  it.each([
    ['get_service_detail', {}, 'service_name'],
    ['query_service_metrics', {}, 'service_name'],
    ['get_slo', {}, 'slo_id'],
    ['troubleshoot_service', {}, 'service_name'],
    ['search_transaction_spans', { start_time: '2024-05-01T10:00:00Z', end_time: '2024-05-01T11:00:00Z' }, 'query_string'],
  ])('%s fails with INVALID_PARAMETER before any AWS call', async (name, params, parameter) => {
    const { api, context } = createTestContext();

    const result = await dispatchTool(name, params, context);

    expect(isError(result)).toBe(true);
    if (isError(result)) {
      expect(result.error.code).toBe(ErrorCode.INVALID_PARAMETER);
      expect(result.error.details?.parameter).toBe(parameter);
    }
    expect(totalCalls(api)).toBe(0);
  });

  it('rejects blank required strings', async () => {
    const { api, context } = createTestContext();

    const result = await dispatchTool('get_slo', { slo_id: '   ' }, context);

    expect(isError(result) && result.error.code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(totalCalls(api)).toBe(0);
  });

  it('rejects out-of-range numbers', async () => {
    const { api, context } = createTestContext();

    const result = await dispatchTool(
      'query_service_metrics',
      { service_name: 'cart', metric_name: 'Latency', hours: 500 },
      context,
    );

    expect(isError(result) && result.error.details?.parameter).toBe('hours');
    expect(totalCalls(api)).toBe(0);
  });

  it('dispatches a known tool to exactly one handler', async () => {
    const { api, context } = createTestContext();
    api.listServices.mockResolvedValueOnce({ items: [service('cart')] });

    const result = await dispatchTool('list_monitored_services', undefined, context);

    expect(isSuccess(result)).toBe(true);
    expect(api.listServices).toHaveBeenCalledTimes(1);
    expect(totalCalls(api)).toBe(1);
  });

  it('turns unexpected failures into INTERNAL_ERROR and logs the stack', async () => {
    const { api, context, log } = createTestContext();
    api.listServices.mockRejectedValueOnce(new TypeError('socket hang up'));

    const result = await dispatchTool('list_monitored_services', {}, context);

    expect(result).toEqual({
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'Internal error while handling tool list_monitored_services',
      },
    });
    const errorEntry = log.entries().find((entry) => entry.event === 'tool_error');
    expect(errorEntry?.err).toMatchObject({ message: 'socket hang up' });
  });

  it('records duration for success and failure', async () => {
    const { api, context, log } = createTestContext();
    api.listServices.mockResolvedValueOnce({ items: [] });
    api.getServiceLevelObjective.mockResolvedValueOnce(undefined);

    await dispatchTool('list_monitored_services', {}, context);
    await dispatchTool('get_slo', { slo_id: 'missing' }, context);

    const ends = log.entries().filter((entry) => entry.event === 'tool_end');
    expect(ends.map((entry) => entry.success)).toEqual([true, false]);
    for (const entry of ends) {
      expect(entry.durationMs).toBeGreaterThanOrEqual(0);
    }
    expect(metrics.getToolMetrics('get_slo')?.errorCount).toBe(1);
  });
});

describe('toCallToolResult', () => {
  it('returns text reports verbatim', () => {
    expect(toCallToolResult(createSuccess('report'))).toEqual({
      content: [{ type: 'text', text: 'report' }],
    });
  });

  it('serializes objects as JSON', () => {
    expect(toCallToolResult(createSuccess({ TraceCount: 0 }))).toEqual({
      content: [{ type: 'text', text: '{\n  "TraceCount": 0\n}' }],
    });
  });

  it('flags error envelopes', () => {
    const result = toCallToolResult({ error: { code: ErrorCode.SLO_NOT_FOUND, message: 'missing' } });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: '{\n  "error": {\n    "code": "SLO_NOT_FOUND",\n    "message": "missing"\n  }\n}',
      },
    ]);
  });
});
