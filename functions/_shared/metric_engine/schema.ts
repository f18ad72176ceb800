import { z, ZodError } from 'zod';

import { resolveEvaluationOrder } from './dependencies.ts';
import { FormulaSyntaxError, SchemaError } from './errors.ts';
import { parseFormula } from './expression.ts';
import {
  AGGREGATION_LEVELS,
  AGGREGATION_RULES,
  ORG_AGGREGATION_LEVELS,
  type AggregationLevel,
  type AggregationRule,
  type Formula,
  type MetricDefinition,
  type MetricTask,
  type SchemaWarning,
} from './types.ts';

const optionSpecSchema = z.object({
  input_type: z.string().min(1),
  value_types: z.array(z.string()).default([]),
  default: z.unknown().optional(),
  input_options: z.array(z.string()).optional(),
  help: z
    .object({
      placeholder: z.unknown().optional(),
      description: z.string().optional(),
    })
    .optional(),
});

const metricEntrySchema = z.object({
  display_name: z.string().trim().min(1),
  type: z.enum(['count', 'computed']),
  content_levels: z.array(z.string()).nullish(),
  org_levels: z.array(z.string()).nullish(),
  faceted: z.boolean().optional(),
  formula: z.string().optional(),
  agg: z.string().optional(),
});

const taskDocumentSchema = z.object({
  slug: z.string().trim().min(1),
  name: z.string().trim().min(1),
  description: z.string().default(''),
  runs: z.string().trim().min(1),
  creates: z.string().default('metrics'),
  option_order: z.array(z.string()).nullish(),
  options: z.record(optionSpecSchema).nullish(),
  metrics: z.record(metricEntrySchema),
});

type MetricEntry = z.infer<typeof metricEntrySchema>;

export interface ParseTaskDocumentOptions {
  warnings?: SchemaWarning[];
}

/**
 * Turns a task document (already decoded from YAML or JSON) into an immutable
 * task with typed metric definitions and a formula evaluation order.
 */
export function parseTaskDocument(document: unknown, parseOptions: ParseTaskDocumentOptions = {}): MetricTask {
  const parsed = parseDocumentShape(document);
  const slug = parsed.slug;

  const options = parsed.options ?? {};
  const optionOrder = parsed.option_order ?? [];
  for (const name of optionOrder) {
    if (!Object.prototype.hasOwnProperty.call(options, name)) {
      throw new SchemaError(`option_order references undeclared option ${name}`, slug);
    }
  }

  const metricNames = new Set(Object.keys(parsed.metrics));
  if (metricNames.size === 0) {
    throw new SchemaError('metrics must declare at least one metric', slug);
  }

  const metrics = Object.entries(parsed.metrics).map(([name, entry]) =>
    buildMetricDefinition(slug, name, entry, metricNames)
  );

  const evaluationOrder = resolveEvaluationOrder(metrics, slug);

  return deepFreeze({
    slug,
    name: parsed.name,
    description: parsed.description.trim(),
    runs: parsed.runs,
    creates: parsed.creates,
    option_order: optionOrder,
    options,
    metrics,
    evaluation_order: evaluationOrder,
    warnings: parseOptions.warnings ?? [],
  });
}

function parseDocumentShape(document: unknown): z.infer<typeof taskDocumentSchema> {
  try {
    return taskDocumentSchema.parse(document);
  } catch (error) {
    if (error instanceof ZodError) {
      const slug = readSlug(document);
      const [issue] = error.errors;
      const path = issue ? issue.path.map(String) : [];
      const metric = path[0] === 'metrics' && path[1] ? path[1] : null;
      const field = path.join('.') || 'document';
      throw new SchemaError(`${field}: ${issue ? issue.message : 'invalid document'}`, slug, metric);
    }
    throw error;
  }
}

function readSlug(document: unknown): string | null {
  if (document && typeof document === 'object' && 'slug' in document) {
    const slug = document.slug;
    return typeof slug === 'string' && slug.trim() ? slug.trim() : null;
  }
  return null;
}

function buildMetricDefinition(
  slug: string,
  name: string,
  entry: MetricEntry,
  metricNames: Set<string>
): MetricDefinition {
  const contentLevels = parseLevels(slug, name, 'content_levels', entry.content_levels ?? [], AGGREGATION_LEVELS);
  const orgLevels = parseLevels(slug, name, 'org_levels', entry.org_levels ?? [], ORG_AGGREGATION_LEVELS);
  const faceted = entry.faceted === true;

  if (faceted && (contentLevels.includes('timeseries') || orgLevels.includes('timeseries'))) {
    throw new SchemaError('faceted metrics cannot be produced at timeseries level', slug, name);
  }

  const formula = parseMetricFormula(slug, name, entry, metricNames);

  return {
    name,
    display_name: entry.display_name.trim(),
    type: entry.type,
    content_levels: contentLevels,
    org_levels: orgLevels,
    faceted,
    formula,
    agg: parseAggregation(slug, name, entry),
  };
}

function parseLevels(
  slug: string,
  metric: string,
  field: string,
  raw: string[],
  allowed: readonly AggregationLevel[]
): AggregationLevel[] {
  const levels: AggregationLevel[] = [];
  for (const value of raw) {
    const level = allowed.find((candidate) => candidate === value.trim());
    if (!level) {
      throw new SchemaError(`${field} contains unsupported level ${value}`, slug, metric);
    }
    if (!levels.includes(level)) {
      levels.push(level);
    }
  }
  return levels;
}

function parseMetricFormula(
  slug: string,
  name: string,
  entry: MetricEntry,
  metricNames: Set<string>
): Formula | null {
  const source = entry.formula?.trim() ?? '';

  if (entry.type === 'count') {
    if (source) {
      throw new SchemaError('count metrics cannot declare a formula', slug, name);
    }
    return null;
  }

  if (!source) {
    throw new SchemaError('computed metrics require a formula', slug, name);
  }

  let formula: Formula;
  try {
    formula = parseFormula(source);
  } catch (error) {
    if (error instanceof FormulaSyntaxError) {
      throw new SchemaError(error.message, slug, name);
    }
    throw error;
  }

  if (formula.references.length === 0) {
    throw new SchemaError('formula must reference at least one metric', slug, name);
  }

  const unknown = formula.references.filter((reference) => !metricNames.has(reference));
  if (unknown.length > 0) {
    throw new SchemaError(`formula references unknown metrics: ${unknown.join(', ')}`, slug, name);
  }

  return formula;
}

function parseAggregation(slug: string, name: string, entry: MetricEntry): AggregationRule {
  if (entry.agg === undefined) {
    return entry.type === 'computed' ? 'avg' : 'sum';
  }
  const rule = AGGREGATION_RULES.find((candidate) => candidate === entry.agg?.trim());
  if (!rule) {
    throw new SchemaError(`unsupported agg ${entry.agg}`, slug, name);
  }
  return rule;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function getMetric(task: MetricTask, name: string): MetricDefinition | null {
  return task.metrics.find((metric) => metric.name === name) ?? null;
}
