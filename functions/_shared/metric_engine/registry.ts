import { HandlerNotFound, SchemaError } from './errors.ts';
import type { MetricTaskHandler } from './handlers.ts';
import type { MetricTask } from './types.ts';

export class HandlerRegistry {
  private handlers: Map<string, MetricTaskHandler>;

  constructor(handlers: MetricTaskHandler[]) {
    this.handlers = new Map();
    for (const handler of handlers) {
      if (this.handlers.has(handler.runs)) {
        throw new Error(`Duplicate task handler: ${handler.runs}`);
      }
      this.handlers.set(handler.runs, handler);
    }
  }

  get(runs: string): MetricTaskHandler | null {
    return this.handlers.get(runs) ?? null;
  }
}

/**
 * Tasks by slug. Every task's `runs` is resolved against the handler registry
 * when the registry is built, so an unknown handler fails at startup.
 */
export class TaskRegistry {
  private tasks: Map<string, { task: MetricTask; handler: MetricTaskHandler }>;

  constructor(tasks: MetricTask[], handlers: HandlerRegistry) {
    this.tasks = new Map();
    for (const task of tasks) {
      if (this.tasks.has(task.slug)) {
        throw new SchemaError('duplicate task slug', task.slug);
      }
      const handler = handlers.get(task.runs);
      if (!handler) {
        throw new HandlerNotFound(`No handler registered for ${task.runs} (task ${task.slug})`);
      }
      handler.assertCompatible(task);
      this.tasks.set(task.slug, { task, handler });
    }
  }

  get(slug: string): MetricTask | null {
    return this.tasks.get(slug)?.task ?? null;
  }

  handlerFor(slug: string): MetricTaskHandler | null {
    return this.tasks.get(slug)?.handler ?? null;
  }

  list(): MetricTask[] {
    return [...this.tasks.values()].map((entry) => entry.task);
  }
}
