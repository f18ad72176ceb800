// ============================================================================
// METRIC TASKS - FUNCTION ENTRY POINT
// ============================================================================
//
// Loads the task definitions once, validates every task against the handler
// registry, and returns a Fetch-style request handler that any Node HTTP
// adapter can mount.
//
// ============================================================================

import dotenv from 'dotenv';

import { loadConfig, type MetricTasksConfig } from '../_shared/config.ts';
import { MetricTaskService } from '../_shared/metric_engine/engine.ts';
import { createDefaultHandlers } from '../_shared/metric_engine/handlers.ts';
import { loadTaskDefinitionsFromDirectory } from '../_shared/metric_engine/node_loader.ts';
import { HandlerRegistry, TaskRegistry } from '../_shared/metric_engine/registry.ts';
import { logger, setLogLevel } from '../_shared/utils/logger.ts';
import { handleMetricTasksRequest } from './handler.ts';

export type MetricTasksFunction = (req: Request) => Promise<Response>;

export async function createMetricTasksFunction(config?: MetricTasksConfig): Promise<MetricTasksFunction> {
  if (!config) {
    dotenv.config();
  }
  const resolved = config ?? loadConfig();
  setLogLevel(resolved.logLevel);

  const tasks = await loadTaskDefinitionsFromDirectory(resolved.tasksDir, { strict: resolved.strict });
  const registry = new TaskRegistry(tasks, new HandlerRegistry(createDefaultHandlers()));
  const metricService = new MetricTaskService(registry);

  logger.info('Metric tasks loaded', {
    tasks: registry.list().map((task) => task.slug),
    tasks_dir: resolved.tasksDir,
  });

  const corsHeaders = {
    'Access-Control-Allow-Origin': resolved.corsAllowOrigin,
    'Access-Control-Allow-Methods': 'POST, OPTIONS',
    'Access-Control-Allow-Headers': 'content-type, x-request-id',
  };

  return (req) => handleMetricTasksRequest(req, { metricService, corsHeaders });
}

export { loadConfig, DEFAULT_TASKS_DIR, type MetricTasksConfig } from '../_shared/config.ts';
export { compareCohorts, describeValues } from '../_shared/metric_engine/cohort.ts';
export { MetricTaskService } from '../_shared/metric_engine/engine.ts';
export * from '../_shared/metric_engine/errors.ts';
export {
  BucketMetricsHandler,
  FacetMetricsHandler,
  createDefaultHandlers,
  type MetricTaskHandler,
} from '../_shared/metric_engine/handlers.ts';
export { loadTaskDefinitionsFromDirectory, parseTaskYaml } from '../_shared/metric_engine/node_loader.ts';
export { HandlerRegistry, TaskRegistry } from '../_shared/metric_engine/registry.ts';
export { parseTaskDocument } from '../_shared/metric_engine/schema.ts';
export { StaticMetricIngestor } from '../_shared/metric_engine/static_ingestor.ts';
export type * from '../_shared/metric_engine/types.ts';
export { handleMetricTasksRequest } from './handler.ts';
