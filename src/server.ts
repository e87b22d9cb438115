#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/config-loader.js';
import { createToolContext } from './context.js';
import { dispatchTool, getRegisteredTools, getTool, toCallToolResult } from './index.js';
import { logger, metrics } from './observability/index.js';

const SERVER_NAME = 'appsignals-mcp-server';
const SERVER_VERSION = '0.1.0';

async function main(): Promise<void> {
  const { config, source, path, warnings } = await loadConfig();
  logger.level = config.logLevel;
  for (const warning of warnings) {
    logger.debug({ code: warning.error.code, path }, warning.error.message);
  }
  logger.info({ region: config.region, configSource: source }, 'Configuration loaded');

  const context = createToolContext(config);
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const { name, title, description } of getRegisteredTools()) {
    const tool = getTool(name);
    if (!tool) continue;

    server.registerTool(
      name,
      { title, description, inputSchema: tool.inputSchema },
      async (args) => toCallToolResult(await dispatchTool(name, args, context)),
    );
  }

  const shutdown = () => {
    logger.info('Shutting down...');
    metrics.logSummary();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info({ tools: getRegisteredTools().length }, 'MCP stdio server ready (stdin/stdout transport)');
}

main().catch((error) => {
  logger.error({ err: error }, 'MCP server failed to start');
  process.exit(1);
});
