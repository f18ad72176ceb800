import { logger } from '../utils/logger.ts';
import { HandlerNotFound, MissingRequiredInputs, TaskNotFound } from './errors.ts';
import { resolveTaskOptions } from './options.ts';
import type { TaskRegistry } from './registry.ts';
import type { MetricTaskRequest, MetricTaskResult, RawMetricIngestor } from './types.ts';
import { assertComparableWindow, eligibleWindow, matchesType, priorWindow } from './window.ts';

export class MetricTaskService {
  constructor(private registry: TaskRegistry) {}

  async execute(request: MetricTaskRequest, ingestor: RawMetricIngestor): Promise<MetricTaskResult> {
    if (!request.task) {
      throw new MissingRequiredInputs(['task']);
    }

    if (!request.target) {
      throw new MissingRequiredInputs(['target']);
    }

    const task = this.registry.get(request.task);
    if (!task) {
      throw new TaskNotFound(`Task not found: ${request.task}`);
    }

    const handler = this.registry.handlerFor(task.slug);
    if (!handler) {
      throw new HandlerNotFound(`No handler registered for ${task.runs} (task ${task.slug})`);
    }

    const options = resolveTaskOptions(task, request.options);
    const { target } = request;
    const log = logger.child({ task: task.slug, scope: target.scope, scope_id: target.id });
    const base = {
      task: task.slug,
      scope: target.scope,
      scope_id: target.id,
      warnings: task.warnings,
    };

    if (target.scope === 'content' && !matchesType(target.type, options.content_item_types)) {
      log.debug('Skipping content item outside configured types', { content_item_type: target.type });
      return { ...base, window: null, skipped: 'content_item_type', metrics: [], errors: [] };
    }

    const window = eligibleWindow(target.created_at, options.max_age);
    if (request.prior_window) {
      assertComparableWindow(request.prior_window, window);
    }
    const started = Date.now();

    const output = await handler.execute(options, task, {
      target,
      ingestor,
      window,
      priorWindow: request.prior_window ?? priorWindow(window),
      levels: request.levels,
    });

    log.info('Metric task executed', {
      metrics: output.metrics.length,
      level_errors: output.errors.length,
      duration_ms: Date.now() - started,
    });

    return { ...base, window, skipped: null, metrics: output.metrics, errors: output.errors };
  }
}
