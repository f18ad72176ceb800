import type { AggregationLevel, MetricScope } from './types.ts';

export class SchemaError extends Error {
  task: string | null;
  metric: string | null;

  constructor(message: string, task: string | null = null, metric: string | null = null) {
    const prefix = [task && `task ${task}`, metric && `metric ${metric}`].filter(Boolean).join(', ');
    super(prefix ? `${prefix}: ${message}` : message);
    this.name = 'SchemaError';
    this.task = task;
    this.metric = metric;
  }
}

export class CircularFormulaError extends Error {
  task: string | null;
  cycle: string[];

  constructor(cycle: string[], task: string | null = null) {
    const path = cycle.join(' -> ');
    super(task ? `task ${task}: circular formula dependency ${path}` : `Circular formula dependency ${path}`);
    this.name = 'CircularFormulaError';
    this.task = task;
    this.cycle = cycle;
  }
}

export class FormulaSyntaxError extends Error {
  constructor(message = 'Invalid formula') {
    super(message);
    this.name = 'FormulaSyntaxError';
  }
}

export class LevelNotSupportedError extends Error {
  metric: string;
  level: AggregationLevel;
  scope: MetricScope;

  constructor(metric: string, level: AggregationLevel, scope: MetricScope) {
    super(`Metric ${metric} does not support ${level} at ${scope} level`);
    this.name = 'LevelNotSupportedError';
    this.metric = metric;
    this.level = level;
    this.scope = scope;
  }
}

export class InvalidTaskOptions extends Error {
  issues: Array<{ option: string; message: string }>;

  constructor(issues: Array<{ option: string; message: string }>, message?: string) {
    super(
      message ||
        `Invalid task options: ${issues.map((issue) => `${issue.option} (${issue.message})`).join(', ')}`
    );
    this.name = 'InvalidTaskOptions';
    this.issues = issues;
  }
}

export class TaskNotFound extends Error {
  constructor(message = 'Task not found') {
    super(message);
    this.name = 'TaskNotFound';
  }
}

export class HandlerNotFound extends Error {
  constructor(message = 'Task handler not found') {
    super(message);
    this.name = 'HandlerNotFound';
  }
}

export class MissingRequiredInputs extends Error {
  missing: string[];

  constructor(missing: string[], message?: string) {
    super(message || `Missing required inputs: ${missing.join(', ')}`);
    this.name = 'MissingRequiredInputs';
    this.missing = missing;
  }
}

export class InvalidTimeContext extends Error {
  /** Request field the bad time value came from. */
  field: string;

  constructor(message = 'Invalid time context', field = 'target.created_at') {
    super(message);
    this.name = 'InvalidTimeContext';
    this.field = field;
  }
}
