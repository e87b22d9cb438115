import { setTimeout as delay } from 'node:timers/promises';
import { AwsMonitoringApi } from './aws/aws-monitoring-api.js';
import type { AppConfig } from './config/config-loader.js';
import { logger } from './observability/index.js';
import type { ToolContext } from './shared/tool-definition.js';

export function createToolContext(config: AppConfig): ToolContext {
  return {
    api: new AwsMonitoringApi(config),
    config,
    logger,
    now: () => new Date(),
    sleep: async (ms) => {
      await delay(ms);
    },
  };
}
